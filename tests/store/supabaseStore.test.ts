import { describe, it, expect } from 'vitest'
import {
  ConflictError,
  NotFoundError,
  StoreError,
  UnavailableEquipmentError,
  ValidationError
} from '@/lib/errors'
import { authError, fakeSupabaseStore, pgError, type Reply } from '../helpers/fakeSupabase'

const USER = '11111111-1111-4111-8111-111111111111'
const OTHER_USER = '22222222-2222-4222-8222-222222222222'
const EQUIPMENT = '33333333-3333-4333-8333-333333333333'
const RESERVATION = '44444444-4444-4444-8444-444444444444'
const LOAN = '55555555-5555-4555-8555-555555555555'

const NO_ROWS = pgError(406, 'PGRST116', 'JSON object requested, multiple (or no) rows returned', 'The result contains 0 rows')

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('expected the call to fail')
}

function replyWith(reply: Reply) {
  return fakeSupabaseStore(() => reply)
}

describe('SupabaseStore reservations', () => {
  it('lists the taken items when create_reservation finds no free slot', async () => {
    const { store, sent } = replyWith(pgError(400, 'P0001', 'equipment_unavailable', 'Camera, Tripod'))
    const error = await rejection(
      store.createReservation(
        { user_id: USER, start_at: '2024-05-01T09:00:00.000Z', end_at: '2024-05-01T12:00:00.000Z' },
        [EQUIPMENT]
      )
    )
    expect(error).toBeInstanceOf(UnavailableEquipmentError)
    expect(error).toMatchObject({ items: ['Camera', 'Tripod'] })
    expect(sent[0].method).toBe('POST')
    expect(sent[0].url.pathname).toBe('/rest/v1/rpc/create_reservation')
    expect(sent[0].body).toEqual({
      p_user_id: USER,
      p_start_at: '2024-05-01T09:00:00.000Z',
      p_end_at: '2024-05-01T12:00:00.000Z',
      p_equipment_ids: [EQUIPMENT]
    })
  })

  it('counts overlapping pending and approved bookings for one item', async () => {
    const { store, sent } = replyWith({ headers: { 'content-range': '*/2' } })
    const count = await store.countBlockingOverlaps(EQUIPMENT, {
      start: new Date('2024-05-01T09:00:00Z'),
      end: new Date('2024-05-01T12:00:00Z')
    })
    expect(count).toBe(2)

    const { method, url, headers } = sent[0]
    expect(method).toBe('HEAD')
    expect(url.pathname).toBe('/rest/v1/reservation_items')
    expect(headers.get('prefer')).toContain('count=exact')
    expect(url.searchParams.get('select')).toBe('id,reservations!inner(status,start_at,end_at)')
    expect(url.searchParams.get('equipment_id')).toBe(`eq.${EQUIPMENT}`)
    expect(url.searchParams.get('reservations.status')).toBe('in.(Pending,Approved)')
    expect(url.searchParams.get('reservations.start_at')).toBe('lt.2024-05-01T12:00:00.000Z')
    expect(url.searchParams.get('reservations.end_at')).toBe('gt.2024-05-01T09:00:00.000Z')
  })

  it('only moves a reservation still in the expected status', async () => {
    const { store, sent } = replyWith(NO_ROWS)
    expect(await store.updateReservationStatus(RESERVATION, 'Denied', 'Pending')).toBeNull()
    expect(sent[0].method).toBe('PATCH')
    expect(sent[0].url.searchParams.get('id')).toBe(`eq.${RESERVATION}`)
    expect(sent[0].url.searchParams.get('status')).toBe('eq.Pending')
    expect(sent[0].body).toEqual({ status: 'Denied' })
  })

  it('reads per-equipment counts from the aggregate function', async () => {
    const { store, sent } = replyWith({ body: [{ equipment_id: EQUIPMENT, count: 3 }] })
    expect(await store.countItemsByEquipment()).toEqual([{ equipment_id: EQUIPMENT, count: 3 }])
    expect(sent[0].method).toBe('POST')
    expect(sent[0].url.pathname).toBe('/rest/v1/rpc/reservations_by_equipment')
  })

  it('fetches only the reservations it is asked for', async () => {
    const row = {
      id: RESERVATION,
      user_id: USER,
      start_at: '2024-05-01T09:00:00+00:00',
      end_at: '2024-05-01T12:00:00+00:00',
      status: 'Approved',
      created_at: '2024-04-01T08:00:00+00:00'
    }
    const { store, sent } = replyWith({ body: [row] })
    expect(await store.getReservationsMany([RESERVATION, RESERVATION])).toEqual([row])
    expect(sent[0].url.searchParams.get('id')).toBe(`in.(${RESERVATION})`)
  })
})

describe('SupabaseStore loans', () => {
  it('does not overwrite a loan that was already returned', async () => {
    const { store, sent } = replyWith(NO_ROWS)
    expect(await store.markLoanReturned(LOAN, '2024-05-04T10:00:00.000Z', 20)).toBeNull()
    expect(sent[0].method).toBe('PATCH')
    expect(sent[0].url.searchParams.get('id')).toBe(`eq.${LOAN}`)
    expect(sent[0].url.searchParams.get('returned_at')).toBe('is.null')
    expect(sent[0].body).toEqual({ returned_at: '2024-05-04T10:00:00.000Z', overdue_fee: 20 })
  })

  it('returns the updated loan', async () => {
    const row = {
      id: LOAN,
      reservation_id: RESERVATION,
      checked_out_at: '2024-05-01T09:00:00+00:00',
      due_at: '2024-05-02T09:00:00+00:00',
      returned_at: '2024-05-04T10:00:00+00:00',
      overdue_fee: '20.00',
      created_at: '2024-05-01T09:00:00+00:00'
    }
    const { store } = replyWith({ body: row })
    expect(await store.markLoanReturned(LOAN, '2024-05-04T10:00:00.000Z', 20)).toEqual({ ...row, overdue_fee: 20 })
  })

  it('maps create_loan refusals to user errors', async () => {
    const input = { reservation_id: RESERVATION, checked_out_at: '2024-05-01T09:00:00.000Z', due_at: '2024-05-02T09:00:00.000Z' }

    const denied = await rejection(replyWith(pgError(400, 'P0001', 'reservation_denied')).store.createLoan(input))
    expect(denied).toBeInstanceOf(ValidationError)
    expect(denied).toMatchObject({ message: 'A denied reservation cannot be checked out.' })

    const missing = await rejection(replyWith(pgError(400, 'P0001', 'reservation_not_found')).store.createLoan(input))
    expect(missing).toBeInstanceOf(NotFoundError)

    const duplicate = await rejection(
      replyWith(pgError(409, '23505', 'duplicate key value violates unique constraint "loans_reservation_id_key"')).store.createLoan(input)
    )
    expect(duplicate).toBeInstanceOf(ConflictError)
    expect(duplicate).toMatchObject({ message: 'This reservation already has a loan.' })
  })
})

describe('SupabaseStore equipment', () => {
  const input = {
    name: 'Oscilloscope',
    category: 'Electronics',
    serial_number: 'OSC-7',
    condition: 'Good',
    location: 'Lab 2',
    daily_limit: 2
  }

  it('reports a duplicate serial number as a conflict', async () => {
    const { store } = replyWith(pgError(409, '23505', 'duplicate key value violates unique constraint "equipment_serial_number_key"'))
    const error = await rejection(store.insertEquipment(input))
    expect(error).toBeInstanceOf(ConflictError)
    expect(error).toMatchObject({ message: 'Serial number already exists.' })
  })

  it('refuses to delete referenced equipment', async () => {
    const { store, sent } = replyWith(
      pgError(409, '23503', 'update or delete on table "equipment" violates foreign key constraint "reservation_items_equipment_id_fkey"')
    )
    const error = await rejection(store.deleteEquipment(EQUIPMENT))
    expect(error).toBeInstanceOf(ValidationError)
    expect(error).toMatchObject({ message: 'Equipment is referenced by reservations or tickets and cannot be deleted.' })
    expect(sent[0].method).toBe('DELETE')
    expect(sent[0].url.searchParams.get('id')).toBe(`eq.${EQUIPMENT}`)
  })

  it('answers malformed ids without a query', async () => {
    const { store, fetch } = replyWith({ body: [] })
    expect(await store.deleteEquipment('not-an-id')).toBe(false)
    expect(await store.getEquipment('not-an-id')).toBeNull()
    expect(fetch).not.toHaveBeenCalled()
  })

  it('raises other database errors as store errors', async () => {
    const { store } = replyWith(pgError(500, 'XX000', 'internal error'))
    const error = await rejection(store.listEquipment())
    expect(error).toBeInstanceOf(StoreError)
    expect(error).toMatchObject({ message: 'list equipment: internal error', code: 'XX000' })
  })
})

describe('SupabaseStore users', () => {
  const row = (id: string, name: string) => ({
    id,
    email: `${name.toLowerCase()}@example.edu`,
    full_name: name,
    role_id: 1,
    status: 'active',
    roles: { name: 'Student' }
  })

  it('reads every user page by page', async () => {
    const firstPage = Array.from({ length: 500 }, (_, i) => row(USER, `User ${i}`))
    const { store, sent } = fakeSupabaseStore(request =>
      request.url.searchParams.get('offset') === '0' ? { body: firstPage } : { body: [row(OTHER_USER, 'Zed')] }
    )
    const users = await store.listUsers()
    expect(users).toHaveLength(501)
    expect(users[500].full_name).toBe('Zed')
    expect(sent.map(r => [r.url.searchParams.get('offset'), r.url.searchParams.get('limit')])).toEqual([
      ['0', '500'],
      ['500', '500']
    ])
    expect(sent[0].url.searchParams.get('order')).toBe('full_name.asc,id.asc')
  })

  it('looks up a de-duplicated set of user ids', async () => {
    const { store, sent } = replyWith({ body: [row(USER, 'Ann'), row(OTHER_USER, 'Ben')] })
    const users = await store.findUsersByIds([USER, USER, 'not-an-id', OTHER_USER])
    expect(users.map(u => u.full_name)).toEqual(['Ann', 'Ben'])
    expect(users[0]).not.toHaveProperty('roles')
    expect(sent).toHaveLength(1)
    expect(sent[0].url.searchParams.get('id')).toBe(`in.(${USER},${OTHER_USER})`)
  })

  it('skips the query when no id is usable', async () => {
    const { store, fetch } = replyWith({ body: [] })
    expect(await store.findUsersByIds([])).toEqual([])
    expect(await store.findUsersByIds(['not-an-id'])).toEqual([])
    expect(fetch).not.toHaveBeenCalled()
  })
})

describe('SupabaseStore credentials', () => {
  it('returns the new auth user id', async () => {
    const { store, sent } = replyWith({
      body: { id: USER, aud: 'authenticated', email: 'ann@example.edu', app_metadata: {}, user_metadata: {}, created_at: '2024-01-01T00:00:00Z' }
    })
    expect(await store.createCredential('ann@example.edu', 'correct-horse')).toBe(USER)
    expect(sent[0].url.pathname).toBe('/auth/v1/admin/users')
    expect(sent[0].body).toMatchObject({ email: 'ann@example.edu', password: 'correct-horse', email_confirm: true })
  })

  it('reports an existing auth account as a conflict', async () => {
    const { store } = replyWith(authError(422, 'email_exists', 'A user with this email address has already been registered'))
    const error = await rejection(store.createCredential('ann@example.edu', 'correct-horse'))
    expect(error).toBeInstanceOf(ConflictError)
    expect(error).toMatchObject({ message: 'Email already registered.' })
  })

  it('reports rejected input as a validation error', async () => {
    const invalid = await rejection(
      replyWith(authError(400, 'validation_failed', 'Unable to validate email address: invalid format')).store.createCredential(
        'ann@example',
        'correct-horse'
      )
    )
    expect(invalid).toBeInstanceOf(ValidationError)
    expect(invalid).toMatchObject({ message: 'Unable to validate email address: invalid format' })

    const weak = await rejection(
      replyWith(authError(422, 'weak_password', 'Password should contain at least one number.')).store.createCredential(
        'ann@example.edu',
        'correct-horse'
      )
    )
    expect(weak).toBeInstanceOf(ValidationError)
    expect(weak).not.toBeInstanceOf(ConflictError)
    expect(weak).toMatchObject({ message: 'Password should contain at least one number.' })
  })

  it('raises auth outages as store errors', async () => {
    const { store } = replyWith(authError(500, 'unexpected_failure', 'Database error creating new user'))
    const error = await rejection(store.createCredential('ann@example.edu', 'correct-horse'))
    expect(error).toBeInstanceOf(StoreError)
    expect(error).toMatchObject({ code: 'unexpected_failure' })
  })
})

describe('SupabaseStore sign-in', () => {
  it('returns the session for valid credentials', async () => {
    const { store, sent } = replyWith({
      body: {
        access_token: 'test-access-token',
        token_type: 'bearer',
        expires_in: 3600,
        refresh_token: 'test-refresh-token',
        user: { id: USER, aud: 'authenticated', email: 'ann@example.edu', app_metadata: {}, user_metadata: {}, created_at: '2024-01-01T00:00:00Z' }
      }
    })
    expect(await store.verifyPassword('ann@example.edu', 'correct-horse')).toEqual({
      userId: USER,
      accessToken: 'test-access-token',
      expiresIn: 3600
    })
    expect(sent[0].url.pathname).toBe('/auth/v1/token')
    expect(sent[0].url.searchParams.get('grant_type')).toBe('password')
  })

  it('answers wrong credentials with null', async () => {
    const { store } = replyWith(authError(400, 'invalid_credentials', 'Invalid login credentials'))
    expect(await store.verifyPassword('ann@example.edu', 'wrong')).toBeNull()
  })

  it('raises other sign-in failures instead of treating them as wrong passwords', async () => {
    const { store } = replyWith(authError(429, 'over_request_rate_limit', 'Request rate limit reached'))
    const error = await rejection(store.verifyPassword('ann@example.edu', 'correct-horse'))
    expect(error).toBeInstanceOf(StoreError)
    expect(error).toMatchObject({ message: 'sign in: Request rate limit reached', code: 'over_request_rate_limit' })
  })
})
