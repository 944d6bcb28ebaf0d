import { useEffect, useState } from 'react'
import { ThemeProvider, createTheme } from '@mui/material/styles'
import {
  Alert,
  Box,
  Button,
  CircularProgress,
  Container,
  CssBaseline,
  Typography,
} from '@mui/material'
import AddIcon from '@mui/icons-material/Add'
import CheckCircleIcon from '@mui/icons-material/CheckCircle'
import type { DocumentType, ExtractionTable, SessionView } from 'shared'
import { ClaimGroupCard } from './ClaimGroupCard'
import { ExtractionResults } from './ExtractionResults'
import {
  addGroup,
  fetchSession,
  removeVoucher,
  submitClaims,
  updateClaimantId,
  updateDocumentType,
  uploadVoucher,
} from './utils/api'

const theme = createTheme({ palette: { mode: 'dark' } })

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : 'Unknown error')

function App() {
  const [session, setSession] = useState<SessionView | null>(null)
  const [tables, setTables] = useState<ExtractionTable[] | null>(null)
  const [error, setError] = useState<string | null>(null)
  const [busy, setBusy] = useState(false)

  // Every change to the session discards the results of the previous submit
  const applyUpdate = async (failureLabel: string, update: () => Promise<SessionView>) => {
    setBusy(true)
    setError(null)
    try {
      setSession(await update())
      setTables(null)
    } catch (err: unknown) {
      setError(`${failureLabel}: ${errorMessage(err)}`)
    } finally {
      setBusy(false)
    }
  }

  useEffect(() => {
    void applyUpdate('Could not load the session', fetchSession)
  }, [])

  const handleFileChange = (groupIndex: number, slotIndex: number, file: File | null) => {
    void applyUpdate(
      file ? `Could not upload ${file.name}` : 'Could not remove the image',
      () => (file ? uploadVoucher(groupIndex, slotIndex, file) : removeVoucher(groupIndex, slotIndex))
    )
  }

  const handleSubmit = async () => {
    setBusy(true)
    setError(null)
    try {
      const result = await submitClaims()
      setTables(result.tables)
    } catch (err: unknown) {
      setTables(null)
      setError(`Submission failed: ${errorMessage(err)}`)
    } finally {
      setBusy(false)
    }
  }

  return (
    <ThemeProvider theme={theme}>
      <CssBaseline />
      <Container maxWidth="lg" sx={{ mt: 4, mb: 6 }}>
        <Typography variant="h4" sx={{ mb: 3 }}>
          Grouped Claim Uploader
        </Typography>

        {error && (
          <Alert severity="error" sx={{ mb: 3 }} onClose={() => setError(null)}>
            {error}
          </Alert>
        )}

        {!session && !error && (
          <Box sx={{ display: 'flex', justifyContent: 'center', my: 6 }}>
            <CircularProgress />
          </Box>
        )}

        {session?.groups.map((group) => (
          <ClaimGroupCard
            key={group.index}
            group={group}
            disabled={busy}
            onClaimantIdChange={(claimantId) =>
              void applyUpdate('Could not save the claimant ID', () =>
                updateClaimantId(group.index, claimantId)
              )
            }
            onFileChange={(slotIndex, file) => handleFileChange(group.index, slotIndex, file)}
            onDocumentTypeChange={(slotIndex, documentType: DocumentType) =>
              void applyUpdate('Could not change the document type', () =>
                updateDocumentType(group.index, slotIndex, documentType)
              )
            }
          />
        ))}

        {session && (
          <Box sx={{ display: 'flex', gap: 2 }}>
            <Button
              variant="outlined"
              startIcon={<AddIcon />}
              disabled={busy}
              onClick={() => void applyUpdate('Could not add a claim group', addGroup)}
            >
              Add More Claim Group
            </Button>
            <Button
              variant="contained"
              startIcon={busy ? <CircularProgress size="20px" /> : <CheckCircleIcon />}
              disabled={busy}
              onClick={() => void handleSubmit()}
            >
              Submit
            </Button>
          </Box>
        )}

        {tables && <ExtractionResults tables={tables} />}
      </Container>
    </ThemeProvider>
  )
}

export default App
