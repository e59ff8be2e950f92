import type { Step } from '../types.js'

export function formatPlan(steps: Step[]): string {
  if (!steps.length) return 'No changes.'
  const lines: string[] = []
  for (const s of steps) {
    const target = s.backend
      ? ` [${s.backend}${s.packages?.length ? `: ${s.packages.join(', ')}` : ''}]`
      : ''
    const paths = s.paths
      ? Object.entries(s.paths)
        .map(([k, v]) => `${k}=${v}`)
        .join(' ')
      : ''
    const state = s.outcome ?? s.status
    lines.push(`- ${s.kind}${target}: ${s.message}${paths ? ` (${paths})` : ''}${state ? ` <${state}>` : ''}`)
  }
  return lines.join('\n')
}
