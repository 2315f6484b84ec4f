/**
 * UI variant data: how each target role is located and which evidence
 * signals identify each dialog shape.
 *
 * New application versions or locales are handled by editing the JSON file
 * (or pointing UI_VARIANTS_PATH at a replacement), not by adding code paths.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import bundledVariants from './ui-variants.json';
import type { Bounds } from '../types/uiTree';
import type { DialogShape, TargetRole } from '../types/flow';
import { ConfigValidationError } from '../utils/errors';

export interface CaptionPattern {
  match: 'equals' | 'contains';
  value: string;
}

export type EvidenceProbe =
  | { kind: 'identifier'; ids: string[] }
  | { kind: 'identifier-text'; id: string; patterns: CaptionPattern[] }
  | { kind: 'roles'; roles: TargetRole[] }
  | { kind: 'text'; text: string }
  | { kind: 'list'; classNameContains: string; childCount: number; childTextContains: string }
  | { kind: 'bounds'; bounds: Bounds }
  | { kind: 'role-caption'; role: TargetRole; patterns: CaptionPattern[] }
  | { kind: 'first-of'; probes: EvidenceProbe[] };

// Common utility schemas
const boundsSchema = z
  .tuple([z.number().int(), z.number().int(), z.number().int(), z.number().int()])
  .refine(([left, top, right, bottom]) => right > left && bottom > top, 'bounds must be [left, top, right, bottom]')
  .transform(([left, top, right, bottom]): Bounds => ({ left, top, right, bottom }));

const roleSchema = z.enum(['accept-button', 'dismiss-button', 'mode-spinner', 'entire-screen-option', 'confirm-button']);

const captionPatternSchema = z.object({
  match: z.enum(['equals', 'contains']),
  value: z.string().min(1)
});

const rejectCaptionsSchema = z.array(z.string().min(1)).optional();

// Locator strategies
const strategySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('identifier'),
    id: z.string().min(1),
    captions: z.array(z.string().min(1)).optional(),
    rejectCaptions: rejectCaptionsSchema
  }),
  z.object({
    kind: z.literal('text'),
    text: z.string().min(1),
    match: z.enum(['equals', 'contains']).default('contains'),
    walkUp: z.boolean().default(true),
    classNameContains: z.string().min(1).optional(),
    rejectCaptions: rejectCaptionsSchema
  }),
  z.object({
    kind: z.literal('structural'),
    classNameContains: z.string().min(1).optional(),
    clickable: z.boolean().optional(),
    enabled: z.boolean().optional(),
    rejectCaptions: rejectCaptionsSchema
  }),
  z.object({
    kind: z.literal('bounds'),
    bounds: boundsSchema,
    clickable: z.boolean().optional(),
    rejectCaptions: rejectCaptionsSchema
  })
]);

export type LocatorStrategy = z.infer<typeof strategySchema>;

const roleDefinitionSchema = z.object({
  escalate: z.boolean().default(false),
  strategies: z.array(strategySchema).min(1, 'at least one strategy required')
});

export type RoleDefinition = z.infer<typeof roleDefinitionSchema>;

// Evidence probes
const probeSchema: z.ZodType<EvidenceProbe, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('identifier'), ids: z.array(z.string().min(1)).min(1) }),
    z.object({ kind: z.literal('identifier-text'), id: z.string().min(1), patterns: z.array(captionPatternSchema).min(1) }),
    z.object({ kind: z.literal('roles'), roles: z.array(roleSchema).min(1) }),
    z.object({ kind: z.literal('text'), text: z.string().min(1) }),
    z.object({
      kind: z.literal('list'),
      classNameContains: z.string().min(1),
      childCount: z.number().int().min(1),
      childTextContains: z.string().min(1)
    }),
    z.object({ kind: z.literal('bounds'), bounds: boundsSchema }),
    z.object({ kind: z.literal('role-caption'), role: roleSchema, patterns: z.array(captionPatternSchema).min(1) }),
    z.object({ kind: z.literal('first-of'), probes: z.array(probeSchema).min(1) })
  ])
);

const signalSchema = z.object({
  name: z.string().min(1),
  weight: z.number().int().min(1),
  required: z.boolean().default(false),
  probe: probeSchema
});

export type SignalDefinition = z.infer<typeof signalSchema>;

const shapeDefinitionSchema = z
  .object({
    threshold: z.number().int().min(1),
    signals: z.array(signalSchema).min(1)
  })
  .refine(
    shape => shape.signals.reduce((sum, signal) => sum + signal.weight, 0) >= shape.threshold,
    'threshold is unreachable with the declared signal weights'
  );

export type ShapeDefinition = z.infer<typeof shapeDefinitionSchema>;

export const UiVariantsSchema = z.object({
  version: z.number().int().min(1),
  roles: z.object({
    'accept-button': roleDefinitionSchema,
    'dismiss-button': roleDefinitionSchema,
    'mode-spinner': roleDefinitionSchema,
    'entire-screen-option': roleDefinitionSchema,
    'confirm-button': roleDefinitionSchema
  }),
  shapes: z.object({
    'incoming-connection': shapeDefinitionSchema,
    'share-dialog': shapeDefinitionSchema,
    'share-chooser': shapeDefinitionSchema,
    'share-confirm': shapeDefinitionSchema
  })
});

export type UiVariants = z.infer<typeof UiVariantsSchema>;

// Compile-time check that every role and shape has an entry
const rolesCovered: Record<TargetRole, true> = {
  'accept-button': true,
  'dismiss-button': true,
  'mode-spinner': true,
  'entire-screen-option': true,
  'confirm-button': true
} satisfies Record<keyof UiVariants['roles'], true>;

const shapesCovered: Record<DialogShape, true> = {
  'incoming-connection': true,
  'share-dialog': true,
  'share-chooser': true,
  'share-confirm': true
} satisfies Record<keyof UiVariants['shapes'], true>;

export const TARGET_ROLES = Object.keys(rolesCovered).filter(
  (role): role is TargetRole => role in rolesCovered
);

export const DIALOG_SHAPES = Object.keys(shapesCovered).filter(
  (shape): shape is DialogShape => shape in shapesCovered
);

/**
 * Validate a raw variants document.
 *
 * @throws ConfigValidationError with one entry per schema issue
 */
export function parseUiVariants(raw: unknown): UiVariants {
  const parsed = UiVariantsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigValidationError(`Invalid UI variants (${issues.length} issue(s))`, issues);
  }
  return parsed.data;
}

/**
 * Load the bundled variants, or the file at `path` when given.
 */
export function loadUiVariants(path?: string): UiVariants {
  if (!path) {
    return parseUiVariants(bundledVariants);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError(`Cannot read UI variants from ${path}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }
  return parseUiVariants(raw);
}
