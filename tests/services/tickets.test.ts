import { beforeEach, describe, it, expect, vi } from 'vitest'
import { ForbiddenError } from '@/lib/errors'
import { Role, toIdentity, type Identity } from '@/lib/roles'
import { addTicketUpdate, editTicket, getTicketDetail, listTickets, openTicket } from '@/lib/services/tickets'
import type { Equipment } from '@/lib/types'
import { MemoryStore } from '../helpers/memoryStore'

let store: MemoryStore
let student: Identity
let other: Identity
let staff: Identity
let printer: Equipment

const opened = new Date('2024-02-01T09:00:00Z')

beforeEach(() => {
  store = new MemoryStore()
  student = toIdentity(store.addUser('Ann Lee'))
  other = toIdentity(store.addUser('Bo Chen'))
  staff = toIdentity(store.addUser('Tess Tech', Role.TechStaff))
  printer = store.addEquipment('3D Printer')
})

const open = (actor: Identity, assignedTo?: string) =>
  openTicket(store, actor, { equipmentId: printer.id, severity: 'High', description: ' Nozzle clogged ', assignedTo }, opened)

describe('openTicket', () => {
  it('opens an unassigned ticket for a student', async () => {
    const ticket = await open(student, staff.userId)
    expect(ticket).toMatchObject({
      equipment_id: printer.id,
      severity: 'High',
      status: 'Open',
      description: 'Nozzle clogged',
      opened_by: student.userId,
      assigned_to: null,
      opened_at: '2024-02-01T09:00:00.000Z',
      closed_at: null
    })
  })

  it('lets staff assign on open', async () => {
    expect((await open(staff, staff.userId)).assigned_to).toBe(staff.userId)
    await expect(open(staff, '0b6f1c2e-8d4a-4f7e-9a51-3c2d1e0f9a8b')).rejects.toThrow('Unknown assignee.')
  })

  it('validates equipment and severity', async () => {
    await expect(openTicket(store, student, { severity: 'Low' }, opened)).rejects.toThrow('Please select equipment.')
    await expect(openTicket(store, student, { equipmentId: 'nope', severity: 'Low' }, opened)).rejects.toThrow(
      'Unknown equipment.'
    )
    await expect(openTicket(store, student, { equipmentId: printer.id, severity: 'Urgent' }, opened)).rejects.toThrow(
      'Invalid severity.'
    )
  })
})

describe('editTicket', () => {
  it('stamps closed_at once', async () => {
    const ticket = await open(student)
    const closed = await editTicket(store, staff, ticket.id, { status: 'Closed' }, new Date('2024-02-02T10:00:00Z'))
    expect(closed).toMatchObject({ status: 'Closed', closed_at: '2024-02-02T10:00:00.000Z' })

    const again = await editTicket(store, staff, ticket.id, { status: 'Closed' }, new Date('2024-02-05T10:00:00Z'))
    expect(again.closed_at).toBe('2024-02-02T10:00:00.000Z')
  })

  it('assigns and clears the assignee', async () => {
    const ticket = await open(student)
    const assigned = await editTicket(store, staff, ticket.id, { status: 'In Progress', assignedTo: staff.userId }, opened)
    expect(assigned).toMatchObject({ status: 'In Progress', assigned_to: staff.userId })
    expect((await editTicket(store, staff, ticket.id, { assignedTo: '' }, opened)).assigned_to).toBeNull()
  })

  it('is staff only', async () => {
    const ticket = await open(student)
    await expect(editTicket(store, student, ticket.id, { status: 'Closed' }, opened)).rejects.toThrow(
      'Only staff may edit tickets.'
    )
    expect(store.tickets.get(ticket.id)?.status).toBe('Open')
  })
})

describe('ticket updates', () => {
  it('accepts notes from the opener and staff, newest first', async () => {
    const ticket = await open(student)
    await addTicketUpdate(store, student, ticket.id, 'Still broken', new Date('2024-02-01T10:00:00Z'))
    await addTicketUpdate(store, staff, ticket.id, ' Replaced nozzle ', new Date('2024-02-01T11:00:00Z'))

    const lookup = vi.spyOn(store, 'findUsersByIds')
    const detail = await getTicketDetail(store, student, ticket.id)
    expect(lookup).toHaveBeenCalledTimes(1)
    expect(detail.updates.map(u => [u.note, u.author?.full_name])).toEqual([
      ['Replaced nozzle', 'Tess Tech'],
      ['Still broken', 'Ann Lee']
    ])
    expect(detail.openedBy?.full_name).toBe('Ann Lee')
    expect(detail.equipment?.name).toBe('3D Printer')
  })

  it('rejects blank notes', async () => {
    const ticket = await open(student)
    await expect(addTicketUpdate(store, student, ticket.id, '   ', opened)).rejects.toThrow('Update text is required.')
  })

  it('keeps other students out', async () => {
    const ticket = await open(student)
    await expect(addTicketUpdate(store, other, ticket.id, 'hi', opened)).rejects.toThrow(ForbiddenError)
    await expect(getTicketDetail(store, other, ticket.id)).rejects.toThrow('You are not allowed to view this ticket.')
  })
})

describe('listTickets', () => {
  it('shows students their own tickets and staff all of them', async () => {
    const mine = await open(student)
    const theirs = await open(other)
    expect((await listTickets(store, student)).map(t => t.id)).toEqual([mine.id])
    expect((await listTickets(store, staff)).map(t => t.id).sort()).toEqual([mine.id, theirs.id].sort())
  })
})
