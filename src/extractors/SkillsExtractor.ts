import { SkillCategory, Skills } from '../types'
import { classifyLine, matchLabel } from '../utils/lines'
import { SkillLabels } from '../utils/patterns'
import { emptySkills } from '../utils/record'
import { appendUnique, splitList } from '../utils/text'

/**
 * Class for extracting categorized skills from a section buffer
 */
export class SkillsExtractor {
  /**
   * Category labels switch the active category; everything else is split on
   * commas, semicolons and pipes into it. Unlabeled skills are technical.
   * "Soft skills: Not specified" clears the category and ignores the lines
   * that follow until the next category label.
   */
  extractSkills(lines: readonly string[]): Skills {
    const skills = emptySkills()
    let active: SkillCategory | null = 'technical'

    for (const raw of lines) {
      const line = classifyLine(raw)
      if (!line) {
        continue
      }

      if (line.kind === 'field') {
        const category = matchLabel(line.label, SkillLabels)
        if (category && line.placeholder) {
          skills[category] = []
          active = null
          continue
        }
        if (category) {
          active = category
        }
        if (active) {
          appendUnique(skills[active], splitList(line.value))
        }
        continue
      }

      if (line.kind === 'item') {
        const category = matchLabel(line.text, SkillLabels)
        if (category) {
          active = category
          continue
        }
      }

      if (active) {
        appendUnique(skills[active], splitList(line.text))
      }
    }

    return skills
  }
}
