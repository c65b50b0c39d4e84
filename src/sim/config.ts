import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigurationError } from './errors'
import { DEFAULT_ALPHA } from './significance'
import { findLabelCollisions } from './thresholds'
import { DEFAULT_PATIENCE_KEY, type SimulationSpec } from './types'

export const WEIGHT_TOLERANCE = 1e-9

const Weight = z.number().finite().nonnegative()

const PatienceDistributionSchema = z.record(
  z.string().regex(/^[1-9]\d*$/, 'max-pull keys must be positive integers'),
  Weight
)

export const SimulationSpecSchema = z
  .object({
    items: z.array(z.string().trim().min(1, 'item identifiers must not be blank')).min(1, 'item list must not be empty'),
    capsulesPerItem: z.number().int().positive(),
    desire: z.record(Weight),
    patience: z.record(PatienceDistributionSchema),
    lifetimes: z.number().int().positive(),
    thresholds: z.array(z.number().min(0).max(1)).min(1, 'at least one snapshot threshold is required'),
    seed: z.string().min(1),
    analysis: z.object({
      threshold: z.number().min(0).max(1),
      item: z.string(),
      alpha: z.number().gt(0).lt(1).default(DEFAULT_ALPHA)
    })
  })
  .superRefine((spec, ctx) => {
    const items = new Set(spec.items)
    if (items.size !== spec.items.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['items'], message: 'item identifiers must be unique' })
    }

    const checkSum = (weights: Record<string, number>, path: (string | number)[]) => {
      const sum = Object.values(weights).reduce((a, b) => a + b, 0)
      if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `weights must sum to 1 (got ${sum})` })
      }
    }

    for (const item of Object.keys(spec.desire)) {
      if (!items.has(item)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['desire', item], message: 'unknown item' })
      }
    }
    checkSum(spec.desire, ['desire'])

    if (!(DEFAULT_PATIENCE_KEY in spec.patience)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['patience'],
        message: `a "${DEFAULT_PATIENCE_KEY}" patience distribution is required`
      })
    }
    for (const [key, distribution] of Object.entries(spec.patience)) {
      if (key !== DEFAULT_PATIENCE_KEY && !items.has(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['patience', key], message: 'unknown item' })
      }
      checkSum(distribution, ['patience', key])
    }

    if (new Set(spec.thresholds).size !== spec.thresholds.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['thresholds'], message: 'thresholds must be unique' })
    }
    for (const collision of findLabelCollisions(spec.thresholds)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['thresholds'], message: `labels must be distinct (${collision})` })
    }
    if (!spec.thresholds.includes(spec.analysis.threshold)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['analysis', 'threshold'],
        message: 'must be one of the configured thresholds'
      })
    }
    if (!items.has(spec.analysis.item)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['analysis', 'item'], message: 'unknown item' })
    }
  })

function formatIssue(issue: z.ZodIssue) {
  const path = issue.path.join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}

export function validateSpec(input: unknown): SimulationSpec {
  const parsed = SimulationSpecSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(formatIssue), parsed.error)
  }
  return parsed.data
}

export async function loadSpec(path: string): Promise<SimulationSpec> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ConfigurationError([`could not read ${path}: ${reason}`], err)
  }
  return validateSpec(raw)
}
