import React, { useEffect, useState } from 'react'

import type { Assessment, Figure, FigureNode } from '../types'
import { radiusOf, toSvgY, viewBoxOf } from '../lib/figure'

type Props = {
  figure: Figure
  busy: boolean
  onChoose: (nodeId: string, choice: Assessment) => void
}

const CHOICES: { value: Assessment; label: string; fill: string }[] = [
  { value: 'known', label: 'I know this', fill: '#f5deb3' },
  { value: 'unknown', label: "I don't", fill: '#e07a5f' },
]

function Chooser({ node, onPick }: { node: FigureNode; onPick: (choice: Assessment) => void }) {
  const w = 2.6
  const h = 0.9
  const top = toSvgY(node.y) + radiusOf(node) + 0.3
  return (
    <g>
      {CHOICES.map((c, i) => {
        const x = node.x - w - 0.1 + i * (w + 0.2)
        return (
          <g key={c.value} className="cursor-pointer" onClick={e => { e.stopPropagation(); onPick(c.value) }}>
            <rect x={x} y={top} width={w} height={h} rx={0.2} fill={c.fill} />
            <text x={x + w / 2} y={top + h / 2} fontSize={0.4} textAnchor="middle" dominantBaseline="central" fill="#1a1a1a">
              {c.label}
            </text>
          </g>
        )
      })}
    </g>
  )
}

export default function GraphCanvas({ figure, busy, onChoose }: Props) {
  const [selected, setSelected] = useState<string | null>(null)
  const selectedNode = figure.nodes.find(n => n.id === selected && n.clickable)

  useEffect(() => {
    setSelected(null)
  }, [figure])

  return (
    <svg
      className="h-full w-full select-none"
      viewBox={viewBoxOf(figure)}
      preserveAspectRatio="xMidYMid meet"
      style={{ background: figure.background }}
      onClick={() => setSelected(null)}
      role="img"
      aria-label="Concept map"
    >
      {figure.edges.map(e => (
        <line key={`${e.from}->${e.to}`} x1={e.x1} y1={toSvgY(e.y1)} x2={e.x2} y2={toSvgY(e.y2)} stroke={e.color} strokeWidth={0.06} />
      ))}
      {figure.nodes.map(n => (
        <g
          key={n.id}
          className={n.clickable && !busy ? 'cursor-pointer' : undefined}
          onClick={e => {
            e.stopPropagation()
            if (n.clickable && !busy) setSelected(s => (s === n.id ? null : n.id))
          }}
        >
          <circle
            cx={n.x}
            cy={toSvgY(n.y)}
            r={radiusOf(n)}
            fill={n.color}
            stroke={n.clickable ? '#2a2a2a' : '#02ab13'}
            strokeWidth={0.05}
          />
          <text
            x={n.x}
            y={toSvgY(n.y) - radiusOf(n) - 0.2}
            fontSize={n.clickable ? 0.42 : 0.55}
            textAnchor="middle"
            fill="#e0e0e0"
          >
            {n.label}
          </text>
        </g>
      ))}
      {selectedNode && !busy && (
        <Chooser
          node={selectedNode}
          onPick={choice => {
            setSelected(null)
            onChoose(selectedNode.id, choice)
          }}
        />
      )}
    </svg>
  )
}
