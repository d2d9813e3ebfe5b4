import { PersonalInfo } from '../types'
import { classifyLine, matchLabel } from '../utils/lines'
import {
  type LabelTable,
  type PersonalField,
  PersonalLabels,
} from '../utils/patterns'
import { emptyPersonalInfo } from '../utils/record'

/**
 * Class for extracting personal information from a section buffer
 */
export class PersonalInfoExtractor {
  constructor(
    private readonly labels: LabelTable<PersonalField> = PersonalLabels
  ) {}

  /**
   * Only labeled lines count; the first non-empty value for a field wins
   */
  extractPersonalInfo(lines: readonly string[]): PersonalInfo {
    const info = emptyPersonalInfo()

    for (const raw of lines) {
      const line = classifyLine(raw)
      if (!line || line.kind !== 'field') {
        continue
      }
      const field = matchLabel(line.label, this.labels)
      if (field && !info[field] && line.value) {
        info[field] = line.value
      }
    }

    return info
  }
}
