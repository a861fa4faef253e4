import type { Figure, FigureNode } from '../types'

// Figure coordinates grow upward; SVG ones grow downward.
export function toSvgY(y: number) {
  return -y
}

export function viewBoxOf(figure: Figure): string {
  const [x0, x1] = figure.viewport.xRange
  const [y0, y1] = figure.viewport.yRange
  return `${x0} ${toSvgY(y1)} ${x1 - x0} ${y1 - y0}`
}

// marker sizes are pixel-like; one data unit is roughly 100 of them
export function radiusOf(node: FigureNode) {
  return node.size / 100
}
