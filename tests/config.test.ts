import { describe, it, expect } from 'vitest'
import { parseConfig } from '@/lib/config'

const env = {
  NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321',
  NEXT_PUBLIC_SUPABASE_ANON_KEY: 'test-anon-key',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret'
}

describe('parseConfig', () => {
  it('applies lending defaults', () => {
    expect(parseConfig(env)).toEqual({
      supabase: { url: 'http://localhost:54321', anonKey: 'test-anon-key', serviceRoleKey: 'test-secret' },
      lending: { overdueFeePerDay: 10, defaultLoanDays: 3 },
      sessionMaxAgeSeconds: 3600
    })
  })

  it('reads overrides from strings', () => {
    const config = parseConfig({ ...env, OVERDUE_FEE_PER_DAY: '2.5', DEFAULT_LOAN_DAYS: '7' })
    expect(config.lending).toEqual({ overdueFeePerDay: 2.5, defaultLoanDays: 7 })
  })

  it('names the missing variables', () => {
    expect(() => parseConfig({ ...env, SUPABASE_SERVICE_ROLE_KEY: undefined })).toThrow(
      'Invalid environment configuration: SUPABASE_SERVICE_ROLE_KEY'
    )
  })
})
