import React from 'react'
import { Box, Button, MenuItem, Paper, TextField, Typography } from '@mui/material'
import InsertPhotoIcon from '@mui/icons-material/InsertPhoto'
import UploadFileIcon from '@mui/icons-material/UploadFile'
import DeleteIcon from '@mui/icons-material/Delete'
import {
  ACCEPTED_IMAGE_EXTENSIONS,
  DOCUMENT_TYPES,
  toDocumentType,
  voucherLabel,
  type DocumentType,
  type VoucherSlotView,
} from 'shared'
import { voucherImageUrl } from './utils/api'

interface Props {
  groupIndex: number
  slot: VoucherSlotView
  disabled: boolean
  onFileChange: (file: File | null) => void
  onDocumentTypeChange: (documentType: DocumentType) => void
}

export function VoucherSlot({ groupIndex, slot, disabled, onFileChange, onDocumentTypeChange }: Props) {
  const label = voucherLabel(slot.index)

  const handleFileChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    if (e.target.files && e.target.files[0]) {
      onFileChange(e.target.files[0])
    }
    e.target.value = ''
  }

  return (
    <Paper variant="outlined" sx={{ p: 2, display: 'flex', flexDirection: 'column', gap: 1.5, minWidth: 0 }}>
      <Typography variant="subtitle2">{label}</Typography>
      <Box
        sx={{
          height: 140,
          border: '1px solid #555',
          borderRadius: 1,
          display: 'flex',
          alignItems: 'center',
          justifyContent: 'center',
          background: '#222',
          overflow: 'hidden',
        }}
      >
        {slot.image ? (
          <img
            src={voucherImageUrl(groupIndex, slot.index, slot.image)}
            alt={`${label} preview`}
            style={{ maxWidth: '100%', maxHeight: '100%', objectFit: 'contain' }}
          />
        ) : (
          <InsertPhotoIcon sx={{ fontSize: 48, color: '#666' }} />
        )}
      </Box>
      <Typography variant="caption" noWrap color="text.secondary">
        {slot.image ? slot.image.fileName : 'No file chosen'}
      </Typography>
      <Box sx={{ display: 'flex', gap: 1 }}>
        <Button
          variant="contained"
          size="small"
          component="label"
          startIcon={<UploadFileIcon />}
          disabled={disabled}
          sx={{ flex: 1 }}
        >
          {slot.image ? 'Replace' : 'Choose'}
          <input
            type="file"
            accept={ACCEPTED_IMAGE_EXTENSIONS.join(',')}
            aria-label={`${label} file`}
            hidden
            onChange={handleFileChange}
          />
        </Button>
        {slot.image && (
          <Button
            variant="outlined"
            size="small"
            color="error"
            startIcon={<DeleteIcon />}
            disabled={disabled}
            onClick={() => onFileChange(null)}
          >
            Remove
          </Button>
        )}
      </Box>
      <TextField
        select
        size="small"
        label="Type"
        value={slot.documentType}
        disabled={disabled}
        onChange={(e) => {
          const documentType = toDocumentType(e.target.value)
          if (documentType) onDocumentTypeChange(documentType)
        }}
      >
        {DOCUMENT_TYPES.map((type) => (
          <MenuItem key={type} value={type}>
            {type}
          </MenuItem>
        ))}
      </TextField>
    </Paper>
  )
}
