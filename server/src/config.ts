import type { ConceptStatus } from './types'

export const APP_TITLE = "conceptlens: explain like I'm an expert"

export const DEFAULT_PORT = 8050
export const DEFAULT_MODEL = 'gpt-4o-mini'

export const GRAPH_CONFIG = {
  baseSpacing: 5.0,
  horizontalSpacing: 4.0,
  levelSpacing: 5.0,
  targetRadius: 10.0,
  viewMargin: 2.0,
  forceLayout: {
    enabled: true,
    iterations: 100,
    kAttract: 0.02,
    kRepel: 0.2,
    minDistance: 0.1,
    maxStep: 1.0,
  },
  rootSizeBase: 120,
  rootSizeMin: 80,
  nodeSizeBase: 50,
  nodeSizeMultiplier: 30,
  flashScale: 1.25,
} as const

export type GraphConfig = typeof GRAPH_CONFIG

export const LLM_CONFIG = {
  starterTerms: 4,
  furtherTerms: 3,
  suggestionTerms: 4,
  maxRetries: 5,
  retryDelayMs: 1000,
  defaultDistance: 0.5,
  defaultBreadth: 0.5,
} as const

export const COLORS = {
  background: '#1a1a1a',
  secondaryBg: '#2a2a2a',
  textPrimary: '#c0c0c0',
  textSecondary: '#e0e0e0',
  accentGreen: '#02ab13',
  accentGreenDark: '#047015',
  wheat: '#f5deb3',
  coral: '#e07a5f',
  white: '#ffffff',
  neutralLight: '#888888',
  black: '#000000',
} as const

export const STATUS_COLORS: Record<ConceptStatus, string> = {
  unexplored: COLORS.accentGreen,
  known: COLORS.wheat,
  unknown: COLORS.coral,
  current: COLORS.white,
}

export const ROOT_COLOR = COLORS.black

export const EDGE_COLORS: Record<ConceptStatus, string> = {
  unexplored: COLORS.accentGreenDark,
  known: 'rgba(245,222,179,0.5)',
  unknown: 'rgba(224,122,95,0.5)',
  current: 'rgba(255,255,255,0.6)',
}

export const HOW_IT_WORKS_MD = `## How it works

1. **Pick a topic.** Type something you want to learn, say "quaternions".

2. **Get a baseline.** You get an initial explanation and a web of related concepts (e.g. "complex numbers", "rotation", "linear algebra").

3. **Tell it what you know.** Click a concept and mark it as known or unknown; the explanation is rewritten around your answer and the map grows.

4. **Iterate to expertise.** Keep marking concepts until the explanation is pitched at exactly your level.
`

export type ServerConfig = {
  port: number
  model: string
  apiKey: string | undefined
  baseUrl: string | undefined
  useMock: boolean
  maxRetries: number
  retryDelayMs: number
}

function intFromEnv(raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n < min) return fallback
  return n
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: intFromEnv(env.PORT, DEFAULT_PORT, 1),
    model: env.MODEL?.trim() || DEFAULT_MODEL,
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL?.trim() || undefined,
    useMock: env.USE_MOCK === '1',
    maxRetries: intFromEnv(env.LLM_MAX_RETRIES, LLM_CONFIG.maxRetries, 1),
    retryDelayMs: intFromEnv(env.LLM_RETRY_DELAY_MS, LLM_CONFIG.retryDelayMs, 0),
  }
}
