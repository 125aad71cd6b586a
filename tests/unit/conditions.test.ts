// conditions.test.ts
// Unit tests for parameter conditions and their operators

import { describe, it, expect } from 'vitest'
import { applyOperator, MAX_CONDITION_DEPTH, ParameterCondition } from '../../src/conditions'
import { ConfigurationError } from '../../src/errors'

describe('applyOperator', () => {
  it('should compare equality across numeric strings and numbers', () => {
    const testCases = [
      { actual: 'en', expected: 'en', result: true },
      { actual: 'en', expected: 'nl', result: false },
      { actual: '3', expected: 3, result: true },
      { actual: 3, expected: '3.0', result: true },
      { actual: true, expected: true, result: true },
      { actual: 'true', expected: true, result: false },
      { actual: null, expected: 'en', result: false },
    ]

    for (const { actual, expected, result } of testCases) {
      expect(applyOperator('equals', actual, expected)).toBe(result)
    }
  })

  it('should treat an unset parameter as not equal to anything', () => {
    expect(applyOperator('notequals', null, 'en')).toBe(true)
  })

  it('should evaluate ordering operators numerically', () => {
    const testCases = [
      { op: 'greaterthan' as const, actual: 7, expected: 5, result: true },
      { op: 'greaterthan' as const, actual: 5, expected: 5, result: false },
      { op: 'greaterequalthan' as const, actual: '5', expected: 5, result: true },
      { op: 'lessthan' as const, actual: 10, expected: 9, result: false },
      { op: 'lessequalthan' as const, actual: 10, expected: '10', result: true },
    ]

    for (const { op, actual, expected, result } of testCases) {
      expect(applyOperator(op, actual, expected)).toBe(result)
    }
  })

  it('should compare non-numeric strings lexically', () => {
    expect(applyOperator('lessthan', 'apple', 'banana')).toBe(true)
  })

  it('should never order an unset parameter', () => {
    expect(applyOperator('greaterthan', null, 0)).toBe(false)
    expect(applyOperator('lessthan', null, 0)).toBe(false)
  })

  it('should test substrings and list membership with contains', () => {
    expect(applyOperator('contains', 'en-GB', 'GB')).toBe(true)
    expect(applyOperator('contains', ['nl', 'en'], 'en')).toBe(true)
    expect(applyOperator('contains', ['nl', 'de'], 'en')).toBe(false)
    expect(applyOperator('contains', 42, '4')).toBe(false)
  })
})

describe('ParameterCondition', () => {
  describe('match', () => {
    it('should require every clause by default', () => {
      const condition = new ParameterCondition({
        conditions: [
          { key: 'lang', value: 'en' },
          { key: 'level', value: 2, operator: 'greaterequalthan' },
        ],
        then: 'yes',
      })

      expect(condition.match({ lang: 'en', level: 3 })).toBe(true)
      expect(condition.match({ lang: 'en', level: 1 })).toBe(false)
      expect(condition.match({ lang: 'nl', level: 3 })).toBe(false)
    })

    it('should need only one clause under disjunction', () => {
      const condition = new ParameterCondition({
        conditions: [
          { key: 'lang', value: 'en' },
          { key: 'lang', value: 'nl' },
        ],
        disjunction: true,
        then: 'yes',
      })

      expect(condition.match({ lang: 'nl' })).toBe(true)
      expect(condition.match({ lang: 'de' })).toBe(false)
      expect(condition.match({})).toBe(false)
    })

    it('should match vacuously without clauses unless disjunctive', () => {
      expect(new ParameterCondition({ conditions: [], then: 'x' }).match({})).toBe(true)
      expect(new ParameterCondition({ conditions: [], disjunction: true, then: 'x' }).match({})).toBe(false)
    })
  })

  describe('evaluate', () => {
    it('should select then or otherwise', () => {
      const condition = new ParameterCondition({
        conditions: [{ key: 'lang', value: 'en' }],
        then: 'english',
        otherwise: 'generic',
      })

      expect(condition.evaluate({ lang: 'en' })).toBe('english')
      expect(condition.evaluate({ lang: 'fr' })).toBe('generic')
    })

    it('should return undefined when nothing applies', () => {
      const condition = new ParameterCondition({
        conditions: [{ key: 'lang', value: 'en' }],
        then: 'english',
      })
      expect(condition.evaluate({ lang: 'fr' })).toBeUndefined()
    })

    it('should recurse into nested conditions', () => {
      const inner = new ParameterCondition({
        conditions: [{ key: 'level', value: 1, operator: 'greaterthan' }],
        then: 'advanced',
        otherwise: 'basic',
      })
      const outer = new ParameterCondition({
        conditions: [{ key: 'lang', value: 'en' }],
        then: inner,
        otherwise: 'other',
      })

      expect(outer.evaluate({ lang: 'en', level: 2 })).toBe('advanced')
      expect(outer.evaluate({ lang: 'en', level: 1 })).toBe('basic')
      expect(outer.evaluate({ lang: 'nl', level: 2 })).toBe('other')
    })
  })

  describe('allPossibilities', () => {
    it('should list every terminal depth first', () => {
      const inner = new ParameterCondition({ conditions: [], then: 'b', otherwise: 'c' })
      const outer = new ParameterCondition({ conditions: [], then: 'a', otherwise: inner })

      expect(outer.allPossibilities()).toEqual(['a', 'b', 'c'])
    })
  })

  describe('Construction', () => {
    it('should default the operator to equals', () => {
      const condition = new ParameterCondition({ conditions: [{ key: 'k', value: 'v' }], then: 1 })
      expect(condition.conditions).toEqual([{ key: 'k', value: 'v', operator: 'equals' }])
    })

    it('should reject nesting deeper than the limit', () => {
      let condition = new ParameterCondition<string>({ conditions: [], then: 'leaf' })
      expect(() => {
        for (let depth = 0; depth <= MAX_CONDITION_DEPTH; depth++) {
          condition = new ParameterCondition<string>({ conditions: [], then: condition })
        }
      }).toThrow(ConfigurationError)
    })
  })

  it('should serialize nested branches', () => {
    const condition = new ParameterCondition({
      conditions: [{ key: 'lang', value: 'en' }],
      then: 'english',
      otherwise: new ParameterCondition({ conditions: [], then: 'generic' }),
    })

    expect(condition.toJSON()).toEqual({
      conditions: [{ key: 'lang', value: 'en', operator: 'equals' }],
      disjunction: false,
      then: 'english',
      otherwise: {
        conditions: [],
        disjunction: false,
        then: 'generic',
      },
    })
  })
})
