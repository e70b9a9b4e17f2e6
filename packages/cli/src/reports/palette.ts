import type { CellStyle } from './table-document.js'

export const DEFAULT_COLOR = '#ffffff'

export const ACTION_COLORS: ReadonlyMap<string, string> = new Map([
  ['create', '#5fd700'],
  ['delete', '#ff0000'],
  ['update', '#ffff00'],
  ['replace', '#ff8700'],
  ['no-op', '#00ffff'],
  ['default', DEFAULT_COLOR],
])

export function actionColor(action: string): string {
  return ACTION_COLORS.get(action) ?? DEFAULT_COLOR
}

export function actionStyle(action: string, colorEnabled: boolean): CellStyle | undefined {
  return colorEnabled ? { color: actionColor(action) } : undefined
}
