import { describe, it, expect } from 'vitest'
import { sleep, TimeoutError, withTimeout } from '@/lib/async-utils'

describe('withTimeout', () => {
  it('resolves when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 50)).resolves.toBe(7)
  })

  it('rejects with a TimeoutError when it does not', async () => {
    const result = withTimeout(sleep(200), 10, 'sleeper')
    await expect(result).rejects.toBeInstanceOf(TimeoutError)
    await expect(result).rejects.toThrow('sleeper timed out after 10ms')
  })
})
