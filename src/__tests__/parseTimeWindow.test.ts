import {parseTimeWindow} from '../handlers/parseTimeWindow'

describe('parseTimeWindow', () => {
  it('should parse each unit', () => {
    expect(parseTimeWindow('90s')).toBe(90_000)
    expect(parseTimeWindow('25m')).toBe(1_500_000)
    expect(parseTimeWindow('36h')).toBe(129_600_000)
    expect(parseTimeWindow('7d')).toBe(604_800_000)
  })

  it('should accept an empty window', () => {
    expect(parseTimeWindow('0s')).toBe(0)
  })

  it.each(['', 'h', '1.5h', '1w', '-1h', ' 1h', '1h30m'])('should reject %p', (windowStr) => {
    expect(() => parseTimeWindow(windowStr)).toThrow('Cannot parse time window length')
  })
})
