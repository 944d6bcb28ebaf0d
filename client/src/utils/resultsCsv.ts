import Papa from 'papaparse'
import type { ExtractionTable } from 'shared'

export const CSV_COLUMNS = ['Claim Group', 'Claimant ID', 'Voucher', 'Document Type', 'File', 'Field', 'Value']

// One CSV row per extracted field
export function buildResultsCsv(tables: ExtractionTable[]): string {
  return Papa.unparse({
    fields: CSV_COLUMNS,
    data: tables.flatMap((table) =>
      table.fields.map((row) => [
        table.groupLabel,
        table.claimantId,
        table.voucherLabel,
        table.documentType,
        table.fileName,
        row.field,
        row.value,
      ])
    ),
  })
}

export function downloadCsv(csv: string, fileName: string) {
  const url = URL.createObjectURL(new Blob([csv], { type: 'text/csv;charset=utf-8' }))
  const link = document.createElement('a')
  link.href = url
  link.download = fileName
  link.click()
  URL.revokeObjectURL(url)
}
