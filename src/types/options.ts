import type { CanvasBounds, ClipWindow } from './base'

// Options that control rasterization and SVG output.
export type RenderOptions = {
  canvas: CanvasBounds
  window: ClipWindow
  invertY: boolean // Model y grows upward when set.
}
