import { Project } from '../types'
import { classifyLine, matchLabel } from '../utils/lines'
import { Patterns, ProjectLabels } from '../utils/patterns'
import { emptyProject, hasContent } from '../utils/record'
import { appendUnique, splitList } from '../utils/text'

interface ProjectsState {
  projects: Project[]
  current: Project | null
}

/**
 * Class for extracting projects from a section buffer
 */
export class ProjectsExtractor {
  extractProjects(lines: readonly string[]): Project[] {
    if (Patterns.noProjects.test(lines.join(' '))) {
      return []
    }

    const state: ProjectsState = { projects: [], current: null }

    for (const raw of lines) {
      const line = classifyLine(raw)
      if (!line || line.kind === 'text') {
        continue
      }

      if (line.kind === 'item') {
        this.startProject(state, line.text)
        continue
      }

      const field = matchLabel(line.label, ProjectLabels)
      if (field === 'name') {
        this.startProject(state, line.value)
      } else if (field === 'description' && line.value) {
        const project = this.currentProject(state)
        project.description = project.description
          ? `${project.description} ${line.value}`
          : line.value
      } else if (field === 'technologies') {
        appendUnique(this.currentProject(state).technologies, splitList(line.value))
      } else if (field === 'url') {
        const project = this.currentProject(state)
        project.url = project.url || line.value
      }
    }

    this.closeProject(state)
    return state.projects
  }

  private startProject(state: ProjectsState, name: string): void {
    this.closeProject(state)
    state.current = { ...emptyProject(), name }
  }

  private closeProject(state: ProjectsState): void {
    if (state.current && hasContent(state.current)) {
      state.projects.push(state.current)
    }
    state.current = null
  }

  private currentProject(state: ProjectsState): Project {
    if (!state.current) {
      state.current = emptyProject()
    }
    return state.current
  }
}
