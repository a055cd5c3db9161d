import { describe, it, expect } from 'vitest'
import { hintsFor } from '../components/KeyHints.js'

describe('hintsFor', () => {
  it('offers month navigation on cursor screens', () => {
    expect(hintsFor('months').map((h) => h.key)).toEqual(['1-4', 'j/k', 'g', '?', 'q'])
    expect(hintsFor('categories').map((h) => h.key)).toContain('j/k')
  })

  it('leaves it out elsewhere', () => {
    expect(hintsFor('overview').map((h) => h.key)).toEqual(['1-4', 'g', '?', 'q'])
  })
})
