/** Request status codes as reported by the Seerr requests API */
export const SeerrRequestStatus = {
  PENDING: 1,
  APPROVED: 2,
  DECLINED: 3,
  FAILED: 4,
  COMPLETED: 5,
} as const

/** Permission bit granting full administrative access in Seerr */
export const SEERR_ADMIN_PERMISSION = 2

export interface SeerrRequestStats {
  total: number
  pending: number
  approved: number
  declined: number
  failed: number
  completed: number
}
