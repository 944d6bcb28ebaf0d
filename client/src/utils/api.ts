import type {
  ApiError,
  DocumentType,
  SessionView,
  SubmissionResult,
  UploadedImageInfo,
} from 'shared'

const BASE_URL = '/api/session'

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${BASE_URL}${path}`, init)
  if (!res.ok) {
    const errorData: Partial<ApiError> = await res.json().catch(() => ({}))
    throw new Error(errorData.error || `HTTP ${res.status}`)
  }
  const data: T = await res.json()
  return data
}

const sendJson = (method: string, body: unknown): RequestInit => ({
  method,
  headers: { 'Content-Type': 'application/json' },
  body: JSON.stringify(body),
})

export const fetchSession = () => request<SessionView>('')

export const addGroup = () => request<SessionView>('/groups', { method: 'POST' })

export const updateClaimantId = (group: number, claimantId: string) =>
  request<SessionView>(`/groups/${group}`, sendJson('PATCH', { claimantId }))

export const uploadVoucher = (group: number, slot: number, file: File) => {
  const form = new FormData()
  form.append('file', file)
  return request<SessionView>(`/groups/${group}/slots/${slot}`, { method: 'PUT', body: form })
}

export const removeVoucher = (group: number, slot: number) =>
  request<SessionView>(`/groups/${group}/slots/${slot}`, { method: 'DELETE' })

export const updateDocumentType = (group: number, slot: number, documentType: DocumentType) =>
  request<SessionView>(`/groups/${group}/slots/${slot}`, sendJson('PATCH', { documentType }))

export const submitClaims = () => request<SubmissionResult>('/submit', { method: 'POST' })

// The revision changes with every upload, so a replaced image never hits a cached preview
export const voucherImageUrl = (group: number, slot: number, image: UploadedImageInfo) =>
  `${BASE_URL}/groups/${group}/slots/${slot}/image?v=${image.revision}`
