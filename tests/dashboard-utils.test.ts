import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { formatDuration, formatNumber, heatColor, matrixMax } from '../src/components/dashboard/utils.js'

describe('dashboard utils', () => {
  it('formats large numbers', () => {
    assert.equal(formatNumber(1500), '1.50K')
    assert.equal(formatNumber(2_500_000), '2.50M')
    assert.equal(formatNumber(999), '999')
    assert.equal(formatNumber(12.34), '12.3')
  })

  it('formats durations', () => {
    assert.equal(formatDuration(20), '20s')
    assert.equal(formatDuration(1800), '30m')
    assert.equal(formatDuration(3900), '1h 05m')
  })

  it('scales heat colors against the maximum', () => {
    assert.equal(heatColor(10, 10), 'rgba(59, 130, 246, 1.00)')
    assert.equal(heatColor(2, 10), 'rgba(59, 130, 246, 0.32)')
    assert.equal(heatColor(0, 10), 'rgba(31, 41, 55, 0.5)')
    assert.equal(heatColor(3, 0), 'rgba(31, 41, 55, 0.5)')
  })

  it('finds the matrix maximum', () => {
    assert.equal(
      matrixMax([
        [1, 4],
        [3, 2]
      ]),
      4
    )
    assert.equal(matrixMax([]), 0)
  })
})
