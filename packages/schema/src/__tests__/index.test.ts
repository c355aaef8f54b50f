import { describe, expect, it } from 'vitest'
import {
  createRequirementSchema,
  planLimitsSchema,
  sectionSchema,
  tcmCredentialInputSchema,
  testcaseRevisionSchema,
  usageIncrementSchema,
} from '../index'

const tenantId = '00000000-0000-0000-0000-000000000000'

describe('tcmCredentialInputSchema', () => {
  it('accepts an API key on its own', () => {
    const result = tcmCredentialInputSchema.safeParse({
      baseUrl: 'https://tcm.example.test',
      apiKey: 'test-secret',
    })

    expect(result.success).toBe(true)
  })

  it('accepts a username and password pair', () => {
    const result = tcmCredentialInputSchema.safeParse({
      baseUrl: 'https://tcm.example.test',
      username: 'qa',
      password: 'test-secret',
    })

    expect(result.success).toBe(true)
  })

  it('rejects an empty API key without a full pair', () => {
    const result = tcmCredentialInputSchema.safeParse({
      baseUrl: 'https://tcm.example.test',
      apiKey: '',
      password: 'test-secret',
    })

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues).toHaveLength(1)
    expect(result.error.issues[0].path).toEqual(['apiKey'])
    expect(result.error.issues[0].message).toBe('Provide an API key or both username and password')
  })
})

describe('planLimitsSchema', () => {
  it('treats -1 as unlimited and rejects anything lower', () => {
    expect(planLimitsSchema.safeParse({ uploads: -1, testcases: -1, api_calls: -1 }).success).toBe(
      true,
    )
    expect(planLimitsSchema.safeParse({ uploads: -2, testcases: 0, api_calls: 0 }).success).toBe(
      false,
    )
  })
})

describe('createRequirementSchema', () => {
  it('keeps unknown detail keys', () => {
    const parsed = createRequirementSchema.parse({
      tenantId,
      labelId: 1,
      title: 'Export report',
      detail: { description: 'CSV export', owner: 'reporting' },
    })

    expect(parsed.detail).toEqual({ description: 'CSV export', owner: 'reporting' })
  })

  it('requires a title', () => {
    expect(
      createRequirementSchema.safeParse({ tenantId, labelId: 1, title: '', detail: {} }).success,
    ).toBe(false)
  })
})

describe('testcaseRevisionSchema', () => {
  it('leaves omitted fields undefined so they carry forward', () => {
    expect(testcaseRevisionSchema.parse({ title: 'Renamed' })).toEqual({ title: 'Renamed' })
  })
})

describe('sectionSchema', () => {
  it('defaults sections to internal', () => {
    expect(sectionSchema.parse({ tenantId, sectionName: 'Smoke' }).source).toBe('internal')
  })

  it('rejects an unknown tool', () => {
    expect(
      sectionSchema.safeParse({ tenantId, sectionName: 'Smoke', source: 'jira' }).success,
    ).toBe(false)
  })
})

describe('usageIncrementSchema', () => {
  it('defaults the amount to one', () => {
    expect(usageIncrementSchema.parse({ metric: 'uploads' })).toEqual({
      metric: 'uploads',
      amount: 1,
    })
  })
})
