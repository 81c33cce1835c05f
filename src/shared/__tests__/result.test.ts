import { describe, it, expect } from 'vitest'
import { ok, err, isOk, isErr, unwrap, unwrapOr, map, fromPromise } from '../result.js'

describe('Result', () => {
  it('ok and err narrow correctly', () => {
    expect(isOk(ok(1))).toBe(true)
    expect(isErr(err('bad'))).toBe(true)
  })

  it('unwrap returns the value or throws the error', () => {
    expect(unwrap(ok('v'))).toBe('v')
    expect(() => unwrap(err(new Error('nope')))).toThrow('nope')
  })

  it('unwrapOr falls back on failure', () => {
    expect(unwrapOr(err('bad'), 7)).toBe(7)
  })

  it('map only touches successes', () => {
    expect(map(ok(2), n => n * 3)).toEqual({ ok: true, value: 6 })
    expect(map(err('x'), (n: number) => n * 3)).toEqual({ ok: false, error: 'x' })
  })

  it('fromPromise wraps rejections', async () => {
    const result = await fromPromise(Promise.reject('plain'))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('plain')
  })
})
