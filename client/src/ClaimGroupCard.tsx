import { useEffect, useState } from 'react'
import { Box, Paper, TextField, Typography } from '@mui/material'
import { groupLabel, type ClaimGroupView, type DocumentType } from 'shared'
import { VoucherSlot } from './VoucherSlot'

interface Props {
  group: ClaimGroupView
  disabled: boolean
  onClaimantIdChange: (claimantId: string) => void
  onFileChange: (slotIndex: number, file: File | null) => void
  onDocumentTypeChange: (slotIndex: number, documentType: DocumentType) => void
}

export function ClaimGroupCard({
  group,
  disabled,
  onClaimantIdChange,
  onFileChange,
  onDocumentTypeChange,
}: Props) {
  const [claimantId, setClaimantId] = useState(group.claimantId)

  useEffect(() => {
    setClaimantId(group.claimantId)
  }, [group.claimantId])

  return (
    <Paper sx={{ p: 3, mb: 3 }}>
      <Typography variant="h6" sx={{ mb: 2 }}>
        {groupLabel(group.index)}
      </Typography>
      <TextField
        label={`Claimant ID for ${groupLabel(group.index)}`}
        value={claimantId}
        disabled={disabled}
        onChange={(e) => setClaimantId(e.target.value)}
        onBlur={() => {
          if (claimantId !== group.claimantId) onClaimantIdChange(claimantId)
        }}
        size="small"
        sx={{ mb: 2, width: { xs: '100%', sm: 320 } }}
      />
      <Box
        sx={{
          display: 'grid',
          gridTemplateColumns: { xs: '1fr 1fr', md: 'repeat(4, 1fr)' },
          gap: 2,
        }}
      >
        {group.slots.map((slot) => (
          <VoucherSlot
            key={slot.index}
            groupIndex={group.index}
            slot={slot}
            disabled={disabled}
            onFileChange={(file) => onFileChange(slot.index, file)}
            onDocumentTypeChange={(documentType) => onDocumentTypeChange(slot.index, documentType)}
          />
        ))}
      </Box>
    </Paper>
  )
}
