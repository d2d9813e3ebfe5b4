import { ResumeRecord } from '../types'

/**
 * Interface for field coverage results
 */
export interface FieldCoverageResult {
  percentage: number
  totalFields: number
  nonEmptyFields: number
}

interface FieldCounts {
  totalFields: number
  nonEmptyFields: number
}

/**
 * Calculates the percentage of non-empty fields in a resume record
 */
export class FieldCoverageCalculator {
  /**
   * Returns the percentage of non-empty fields as a value between 0-100.
   * An empty list counts as one empty field, so a resume without projects
   * scores lower than one with them.
   */
  public static calculateCoverage(record: ResumeRecord): FieldCoverageResult {
    const counts = this.countFieldsRecursive(record)

    const percentage =
      counts.totalFields > 0
        ? Math.round((counts.nonEmptyFields / counts.totalFields) * 100)
        : 0

    return {
      percentage,
      totalFields: counts.totalFields,
      nonEmptyFields: counts.nonEmptyFields,
    }
  }

  /**
   * Recursively count total fields and non-empty fields
   */
  private static countFieldsRecursive(value: unknown): FieldCounts {
    if (Array.isArray(value)) {
      if (value.length === 0) {
        return { totalFields: 1, nonEmptyFields: 0 }
      }
      return this.sum(value.map((item: unknown) => this.countFieldsRecursive(item)))
    }

    if (typeof value === 'object' && value !== null) {
      return this.sum(
        Object.values(value).map((item: unknown) => this.countFieldsRecursive(item))
      )
    }

    return {
      totalFields: 1,
      nonEmptyFields: this.isNonEmptyValue(value) ? 1 : 0,
    }
  }

  private static sum(counts: FieldCounts[]): FieldCounts {
    return counts.reduce(
      (total, count) => ({
        totalFields: total.totalFields + count.totalFields,
        nonEmptyFields: total.nonEmptyFields + count.nonEmptyFields,
      }),
      { totalFields: 0, nonEmptyFields: 0 }
    )
  }

  private static isNonEmptyValue(value: unknown): boolean {
    if (value === undefined || value === null) {
      return false
    }
    if (typeof value === 'string') {
      return value.trim() !== ''
    }
    return true
  }
}
