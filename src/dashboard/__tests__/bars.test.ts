import { describe, it, expect } from 'vitest'
import { bar } from '../bars.js'

describe('bar', () => {
  it('scales against the maximum', () => {
    expect(bar(50, 100, 10)).toBe('█████')
    expect(bar(100, 100, 10)).toBe('██████████')
  })

  it('shows at least one block for small positive values', () => {
    expect(bar(0.01, 100, 10)).toBe('█')
  })

  it('never exceeds the width', () => {
    expect(bar(300, 100, 4)).toBe('████')
  })

  it('is empty for zero, negative or missing scale', () => {
    expect(bar(0, 100)).toBe('')
    expect(bar(-5, 100)).toBe('')
    expect(bar(5, 0)).toBe('')
  })
})
