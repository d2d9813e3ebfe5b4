import { describe, expect, it } from 'vitest'
import { HeuristicExtractor } from '../extractors/HeuristicExtractor'
import { FieldCoverageCalculator } from '../utils/FieldCoverageCalculator'
import { emptyResumeData, freezeRecord } from '../utils/record'
import { JANE_ROE } from './helpers'

describe('FieldCoverageCalculator', () => {
  it('counts every empty field and list of an empty record', () => {
    expect(FieldCoverageCalculator.calculateCoverage(freezeRecord(emptyResumeData()))).toEqual({
      percentage: 0,
      totalFields: 12,
      nonEmptyFields: 0,
    })
  })

  it('rounds the percentage', () => {
    const record = new HeuristicExtractor().parse('### Skills\nTechnical skills: Python')
    expect(FieldCoverageCalculator.calculateCoverage(record)).toEqual({
      percentage: 8,
      totalFields: 12,
      nonEmptyFields: 1,
    })
  })

  it('counts list entries and nested fields', () => {
    expect(FieldCoverageCalculator.calculateCoverage(JANE_ROE)).toEqual({
      percentage: 94,
      totalFields: 33,
      nonEmptyFields: 31,
    })
  })
})
