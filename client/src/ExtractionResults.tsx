import {
  Alert,
  Box,
  Button,
  Paper,
  Table,
  TableBody,
  TableCell,
  TableContainer,
  TableHead,
  TableRow,
  Typography,
} from '@mui/material'
import DownloadIcon from '@mui/icons-material/Download'
import type { ExtractionTable } from 'shared'
import { buildResultsCsv, downloadCsv } from './utils/resultsCsv'

type Props = {
  tables: ExtractionTable[]
}

const groupTables = (tables: ExtractionTable[]) => {
  const groups = new Map<number, ExtractionTable[]>()
  for (const table of tables) {
    groups.set(table.groupIndex, [...(groups.get(table.groupIndex) ?? []), table])
  }
  return [...groups.values()]
}

export function ExtractionResults({ tables }: Props) {
  if (tables.length === 0) {
    return (
      <Alert severity="info" sx={{ mt: 3 }}>
        No vouchers uploaded yet. Add images to a claim group and submit again.
      </Alert>
    )
  }

  return (
    <Box sx={{ mt: 4 }}>
      <Box sx={{ display: 'flex', alignItems: 'center', justifyContent: 'space-between', mb: 2 }}>
        <Typography variant="h5">Extracted Fields</Typography>
        <Button
          variant="outlined"
          startIcon={<DownloadIcon />}
          onClick={() => downloadCsv(buildResultsCsv(tables), 'claim_vouchers.csv')}
        >
          Download CSV
        </Button>
      </Box>
      {groupTables(tables).map((groupedTables) => {
        const [first] = groupedTables
        if (!first) return null
        return (
          <Box key={first.groupIndex} sx={{ mb: 4 }}>
            <Typography variant="h6">Entity Tables for {first.groupLabel}</Typography>
            {first.claimantId && (
              <Typography variant="body2" color="text.secondary" sx={{ mb: 1 }}>
                Claimant ID: {first.claimantId}
              </Typography>
            )}
            {groupedTables.map((table) => (
              <Box key={table.slotIndex} sx={{ mt: 2 }}>
                <Typography variant="subtitle2" sx={{ mb: 1 }}>
                  {`${table.voucherLabel} (${table.documentType})`}
                </Typography>
                <TableContainer component={Paper} sx={{ maxWidth: 480 }}>
                  <Table size="small" aria-label={`${table.groupLabel} ${table.voucherLabel} fields`}>
                    <TableHead>
                      <TableRow>
                        <TableCell>Field</TableCell>
                        <TableCell>Value</TableCell>
                      </TableRow>
                    </TableHead>
                    <TableBody>
                      {table.fields.map((row) => (
                        <TableRow key={row.field} sx={{ '&:last-child td, &:last-child th': { border: 0 } }}>
                          <TableCell>{row.field}</TableCell>
                          <TableCell>{row.value}</TableCell>
                        </TableRow>
                      ))}
                    </TableBody>
                  </Table>
                </TableContainer>
              </Box>
            ))}
          </Box>
        )
      })}
    </Box>
  )
}
