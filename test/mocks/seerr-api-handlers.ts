import { HttpResponse, http } from 'msw'
import seerrUsers from '../fixtures/seerr-users.json' with { type: 'json' }

export const SEERR_URL = 'http://seerr.test'
export const SEERR_API_KEY = 'test-secret'

const api = (path: string) => `${SEERR_URL}/api/v1/${path}`

export { seerrUsers }

/** Discord IDs saved in each user's general settings */
export const savedDiscordIds: Record<number, string> = {
  1: '100000000000000001',
  2: '100000000000000002',
  3: '100000000000000003',
  4: '',
}

/**
 * Request statuses per user
 * (1 pending, 2 approved, 3 declined, 4 failed, 5 completed)
 */
export const requestStatuses: Record<number, number[]> = {
  2: [1, 2, 2, 3, 5, 5, 5],
}

function unauthorized(request: Request) {
  return request.headers.get('X-Api-Key') === SEERR_API_KEY
    ? null
    : HttpResponse.json({ message: 'Unauthorized' }, { status: 401 })
}

function userId(param: string | readonly string[] | undefined): number {
  return Number(Array.isArray(param) ? param[0] : param)
}

export const seerrApiHandlers = [
  http.get(api('status'), ({ request }) => {
    return unauthorized(request) ?? HttpResponse.json({ version: '2.5.0' })
  }),

  http.get(api('user'), ({ request }) => {
    const denied = unauthorized(request)
    if (denied) return denied

    const url = new URL(request.url)
    const take = Number(url.searchParams.get('take') ?? 10)
    const skip = Number(url.searchParams.get('skip') ?? 0)

    return HttpResponse.json({
      pageInfo: {
        pages: Math.ceil(seerrUsers.length / take),
        page: Math.floor(skip / take) + 1,
        results: seerrUsers.length,
        pageSize: take,
      },
      results: seerrUsers.slice(skip, skip + take),
    })
  }),

  http.get(api('user/:id'), ({ request, params }) => {
    const denied = unauthorized(request)
    if (denied) return denied

    const user = seerrUsers.find((u) => u.id === userId(params.id))
    return user
      ? HttpResponse.json(user)
      : HttpResponse.json({ message: 'User not found' }, { status: 404 })
  }),

  http.get(api('user/:id/settings/main'), ({ request, params }) => {
    const denied = unauthorized(request)
    if (denied) return denied

    const id = userId(params.id)
    return HttpResponse.json({
      username: seerrUsers.find((u) => u.id === id)?.displayName ?? null,
      discordId: savedDiscordIds[id] ?? '',
    })
  }),

  http.get(api('user/:id/settings/notifications'), ({ request }) => {
    return unauthorized(request) ?? HttpResponse.json({ discordId: null })
  }),

  http.get(api('user/:id/requests'), ({ request, params }) => {
    const denied = unauthorized(request)
    if (denied) return denied

    const statuses = requestStatuses[userId(params.id)] ?? []
    return HttpResponse.json({
      pageInfo: { pages: 1, page: 1, results: statuses.length, pageSize: 100 },
      results: statuses.map((status, index) => ({ id: index + 1, status })),
    })
  }),
]
