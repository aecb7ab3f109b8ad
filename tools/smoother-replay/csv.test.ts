import { SampleFileError, parseSamples } from './csv'

describe('parseSamples', () => {
  it('should parse one column per row for 1D', () => {
    expect(parseSamples('1\n2.5\n-3\n', 1)).toEqual([
      { line: 1, values: [1] },
      { line: 2, values: [2.5] },
      { line: 3, values: [-3] },
    ])
  })

  it('should parse x,y pairs for 2D', () => {
    expect(parseSamples('1, 2\n3,4', 2)).toEqual([
      { line: 1, values: [1, 2] },
      { line: 2, values: [3, 4] },
    ])
  })

  it('should skip blank lines and comments but keep line numbers', () => {
    const rows = parseSamples('# header\n\n10\r\n  # note\n20', 1)
    expect(rows).toEqual([
      { line: 3, values: [10] },
      { line: 5, values: [20] },
    ])
  })

  it('should report a wrong column count with its line', () => {
    expect(() => parseSamples('1\n2,3\n', 1)).toThrow('line 2: expected 1 column, got 2')
    expect(() => parseSamples('1,2\n3\n', 2)).toThrow('line 2: expected 2 columns, got 1')
  })

  it('should report a non-numeric cell', () => {
    let caught: unknown
    try {
      parseSamples('1\nabc\n', 1)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(SampleFileError)
    if (caught instanceof SampleFileError) {
      expect(caught.line).toBe(2)
      expect(caught.message).toBe('line 2: "abc" is not a number')
    }
  })

  it('should reject empty and non-finite cells', () => {
    expect(() => parseSamples('1,\n', 2)).toThrow('line 1: "" is not a number')
    expect(() => parseSamples('Infinity\n', 1)).toThrow('line 1: "Infinity" is not a number')
  })
})
