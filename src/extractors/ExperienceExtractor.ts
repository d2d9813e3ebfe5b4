import { Experience } from '../types'
import { classifyLine, matchLabel } from '../utils/lines'
import { ExperienceLabels } from '../utils/patterns'
import { emptyExperience, hasContent } from '../utils/record'

interface ExperienceState {
  entries: Experience[]
  current: Experience | null
}

/**
 * Class for extracting work experience entries from a section buffer
 */
export class ExperienceExtractor {
  extractExperience(lines: readonly string[]): Experience[] {
    const state: ExperienceState = { entries: [], current: null }

    for (const raw of lines) {
      const line = classifyLine(raw)
      if (!line) {
        continue
      }

      if (line.kind === 'item') {
        this.startEntry(state, line.text)
        continue
      }

      if (line.kind === 'text') {
        this.currentEntry(state).achievements.push(line.text)
        continue
      }

      const field = matchLabel(line.label, ExperienceLabels)
      switch (field) {
        case 'company':
          this.startEntry(state, line.value)
          break
        case 'title':
        case 'dates':
        case 'location': {
          const entry = this.currentEntry(state)
          if (!entry[field]) {
            entry[field] = line.value
          }
          break
        }
        case 'achievements':
          if (line.value) {
            this.currentEntry(state).achievements.push(line.value)
          }
          break
        default:
          // "Key result: cut costs 20%" is an achievement, "Notes:" is skipped
          if (line.value) {
            this.currentEntry(state).achievements.push(line.line)
          }
      }
    }

    this.closeEntry(state)
    return state.entries
  }

  private startEntry(state: ExperienceState, company: string): void {
    this.closeEntry(state)
    state.current = { ...emptyExperience(), company }
  }

  private closeEntry(state: ExperienceState): void {
    if (state.current && hasContent(state.current)) {
      state.entries.push(state.current)
    }
    state.current = null
  }

  private currentEntry(state: ExperienceState): Experience {
    if (!state.current) {
      state.current = emptyExperience()
    }
    return state.current
  }
}
