import { COLORS, EDGE_COLORS, GRAPH_CONFIG, ROOT_COLOR, STATUS_COLORS } from '../config'
import type { ConceptNode, Edge, Figure, FigureEdge, FigureNode, Point, Positions, SessionState, Viewport } from '../types'

export type TreeLayoutOptions = {
  horizontalSpacing: number
  levelSpacing: number
}

export type ForceLayoutOptions = {
  iterations: number
  kAttract: number
  kRepel: number
  minDistance: number
  maxStep: number
  baseSpacing: number
  pinned?: string[]
}

export type NodeVisual = {
  color: string
  size: number
  clickable: boolean
}

export type FigureOptions = {
  flashId?: string | null
  forceLayout?: boolean
}

const DEFAULT_VIEWPORT: Viewport = { xRange: [-10, 10], yRange: [-10, 10] }

const DEFAULT_FORCE: ForceLayoutOptions = { ...GRAPH_CONFIG.forceLayout, baseSpacing: GRAPH_CONFIG.baseSpacing }

export function edgesOf(nodes: ConceptNode[]): Edge[] {
  const ids = new Set(nodes.map(n => n.id))
  const out: Edge[] = []
  for (const n of nodes) {
    if (n.parentId !== null && ids.has(n.parentId)) out.push({ from: n.parentId, to: n.id, distance: n.distance })
  }
  return out
}

/**
 * Tidy tree: every leaf takes one horizontal slot, parents sit centered over
 * their children, depth goes downward. The root ends up at the origin.
 */
export function buildNodePositions(
  nodes: ConceptNode[],
  options: TreeLayoutOptions = GRAPH_CONFIG,
): Positions {
  const positions: Positions = new Map()
  const root = nodes.find(n => n.parentId === null)
  if (!root) return positions

  const children = new Map<string, string[]>()
  for (const n of nodes) {
    if (n.parentId === null) continue
    const list = children.get(n.parentId)
    if (list) list.push(n.id)
    else children.set(n.parentId, [n.id])
  }

  let nextSlot = 0
  const place = (id: string, depth: number): number => {
    const kids = (children.get(id) ?? []).filter(k => !positions.has(k))
    let x: number
    if (kids.length === 0) {
      x = nextSlot * options.horizontalSpacing
      nextSlot++
    } else {
      // reserve the slot first so a cycle in bad input cannot recurse forever
      positions.set(id, { x: 0, y: 0 })
      const xs = kids.map(k => place(k, depth + 1))
      x = (xs[0] + xs[xs.length - 1]) / 2
    }
    positions.set(id, { x, y: -depth * options.levelSpacing })
    return x
  }
  const rootX = place(root.id, 0)

  const shifted: Positions = new Map()
  for (const [id, p] of positions) shifted.set(id, { x: p.x - rootX, y: p.y })
  return shifted
}

export function applyForceDirectedLayout(
  positions: Positions,
  edges: Edge[],
  options: ForceLayoutOptions = DEFAULT_FORCE,
): Positions {
  const ids = [...positions.keys()]
  const pinned = new Set(options.pinned ?? [])
  const pos = new Map<string, Point>()
  for (const [id, p] of positions) pos.set(id, { ...p })

  for (let iter = 0; iter < options.iterations; iter++) {
    const disp = new Map<string, Point>(ids.map(id => [id, { x: 0, y: 0 }]))

    for (let i = 0; i < ids.length; i++) {
      for (let j = i + 1; j < ids.length; j++) {
        const a = pos.get(ids[i])
        const b = pos.get(ids[j])
        const da = disp.get(ids[i])
        const db = disp.get(ids[j])
        if (!a || !b || !da || !db) continue
        const dx = a.x - b.x
        const dy = a.y - b.y
        const d = Math.max(options.minDistance, Math.hypot(dx, dy))
        const f = options.kRepel / d
        da.x += (dx / d) * f
        da.y += (dy / d) * f
        db.x -= (dx / d) * f
        db.y -= (dy / d) * f
      }
    }

    for (const e of edges) {
      const child = pos.get(e.to)
      const parent = pos.get(e.from)
      const dc = disp.get(e.to)
      const dp = disp.get(e.from)
      if (!child || !parent || !dc || !dp) continue
      const dx = child.x - parent.x
      const dy = child.y - parent.y
      const d = Math.max(options.minDistance, Math.hypot(dx, dy))
      const f = options.kAttract * (d - e.distance * options.baseSpacing)
      dc.x -= (dx / d) * f
      dc.y -= (dy / d) * f
      dp.x += (dx / d) * f
      dp.y += (dy / d) * f
    }

    for (const id of ids) {
      if (pinned.has(id)) continue
      const p = pos.get(id)
      const d = disp.get(id)
      if (!p || !d) continue
      const len = Math.hypot(d.x, d.y)
      const scale = len > options.maxStep ? options.maxStep / len : 1
      pos.set(id, { x: p.x + d.x * scale, y: p.y + d.y * scale })
    }
  }
  return pos
}

/** Shrinks the layout around the origin when any node lies beyond `targetRadius`. */
export function rescalePositions(positions: Positions, targetRadius: number = GRAPH_CONFIG.targetRadius): Positions {
  let maxRadius = 0
  for (const p of positions.values()) maxRadius = Math.max(maxRadius, Math.hypot(p.x, p.y))
  if (maxRadius <= targetRadius) return positions
  const k = targetRadius / maxRadius
  const out: Positions = new Map()
  for (const [id, p] of positions) out.set(id, { x: p.x * k, y: p.y * k })
  return out
}

export function calculateVisualProperties(nodes: ConceptNode[], flashId?: string | null): Map<string, NodeVisual> {
  const rootSize = Math.max(GRAPH_CONFIG.rootSizeMin, GRAPH_CONFIG.rootSizeBase - 2 * (nodes.length - 1))
  const out = new Map<string, NodeVisual>()
  for (const n of nodes) {
    const isRoot = n.parentId === null
    let size = isRoot ? rootSize : GRAPH_CONFIG.nodeSizeBase + GRAPH_CONFIG.nodeSizeMultiplier * n.breadth
    if (flashId && n.id === flashId) size *= GRAPH_CONFIG.flashScale
    out.set(n.id, {
      color: isRoot ? ROOT_COLOR : STATUS_COLORS[n.status],
      size,
      clickable: !isRoot,
    })
  }
  return out
}

export function calculateEdgeProperties(nodes: ConceptNode[], positions: Positions): FigureEdge[] {
  const byId = new Map(nodes.map(n => [n.id, n]))
  const out: FigureEdge[] = []
  for (const e of edgesOf(nodes)) {
    const a = positions.get(e.from)
    const b = positions.get(e.to)
    const child = byId.get(e.to)
    if (!a || !b || !child) continue
    out.push({ from: e.from, to: e.to, x1: a.x, y1: a.y, x2: b.x, y2: b.y, color: EDGE_COLORS[child.status] })
  }
  return out
}

/** Square viewport centered on the focus node that still covers every node. */
export function calculateViewRange(positions: Positions, focusId?: string): Viewport {
  if (positions.size < 2) return DEFAULT_VIEWPORT
  const focus = (focusId && positions.get(focusId)) || { x: 0, y: 0 }
  const xs = [...positions.values()].map(p => p.x)
  const ys = [...positions.values()].map(p => p.y)
  const spreadX = Math.max(focus.x - Math.min(...xs), Math.max(...xs) - focus.x)
  const spreadY = Math.max(focus.y - Math.min(...ys), Math.max(...ys) - focus.y)
  const spread = Math.max(spreadX, spreadY) * 1.2 + 5
  return {
    xRange: [focus.x - spread, focus.x + spread],
    yRange: [focus.y - spread, focus.y + spread],
  }
}

export function generateFigure(state: SessionState | null, options: FigureOptions = {}): Figure {
  if (!state || state.nodes.length === 0) {
    return { nodes: [], edges: [], viewport: DEFAULT_VIEWPORT, background: COLORS.background }
  }
  const root = state.nodes.find(n => n.parentId === null)
  let positions = buildNodePositions(state.nodes)
  if (options.forceLayout ?? GRAPH_CONFIG.forceLayout.enabled) {
    positions = applyForceDirectedLayout(positions, edgesOf(state.nodes), {
      ...DEFAULT_FORCE,
      pinned: root ? [root.id] : [],
    })
  }
  positions = rescalePositions(positions)

  const visuals = calculateVisualProperties(state.nodes, options.flashId)
  const nodes: FigureNode[] = []
  for (const n of state.nodes) {
    const p = positions.get(n.id)
    const vis = visuals.get(n.id)
    if (!p || !vis) continue
    nodes.push({ id: n.id, label: n.label, x: p.x, y: p.y, status: n.status, ...vis })
  }
  return {
    nodes,
    edges: calculateEdgeProperties(state.nodes, positions),
    viewport: calculateViewRange(positions, root?.id),
    background: COLORS.background,
  }
}

/** Fits the viewport to the bounding box of all nodes plus `margin` on each side. */
export function autoscaleFigure(figure: Figure, margin: number = GRAPH_CONFIG.viewMargin): Figure {
  if (figure.nodes.length === 0) return { ...figure, viewport: DEFAULT_VIEWPORT }
  const xs = figure.nodes.map(n => n.x)
  const ys = figure.nodes.map(n => n.y)
  return {
    ...figure,
    viewport: {
      xRange: [Math.min(...xs) - margin, Math.max(...xs) + margin],
      yRange: [Math.min(...ys) - margin, Math.max(...ys) + margin],
    },
  }
}
