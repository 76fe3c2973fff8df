export const palette = {
  accent: '#4F46E5',
  overdue: '#FF5252',
  due: '#3F7FBF',
  open: '#D2D2D2',
  done: '#9CA3AF',
  background: '#FFFFFF',
  foreground: '#111827'
} as const;

type Palette = typeof palette;
export type PaletteKey = keyof Palette;
