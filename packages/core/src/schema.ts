import { z } from 'zod';

export const SEMANTIC_TYPES = [
  'text',
  'email',
  'phone',
  'password',
  'number',
  'date',
  'time',
  'datetime',
  'checkbox',
  'radio',
  'select',
  'textarea',
  'file',
  'hidden',
  'url'
] as const;

export type SemanticType = (typeof SEMANTIC_TYPES)[number];

export const SCENARIOS = ['valid', 'invalid', 'edgeCase', 'boundary'] as const;

export const scenarioSchema = z.enum(SCENARIOS);

export const fieldConstraintsSchema = z
  .object({
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
    pattern: z.string().min(1).optional(),
    minValue: z.number().finite().optional(),
    maxValue: z.number().finite().optional(),
    options: z.array(z.string()).optional(),
    multiple: z.boolean().optional()
  })
  .superRefine((value, ctx) => {
    if (value.minLength !== undefined && value.maxLength !== undefined && value.minLength > value.maxLength) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minLength must not exceed maxLength' });
    }
    if (value.minValue !== undefined && value.maxValue !== undefined && value.minValue > value.maxValue) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minValue must not exceed maxValue' });
    }
    if (value.pattern !== undefined) {
      try {
        new RegExp(value.pattern);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `pattern is not a valid regular expression: ${value.pattern}`
        });
      }
    }
  });

// semanticType stays an open string: extraction may report types the catalog does not know,
// and those fall back to the text rule instead of being rejected here.
export const fieldSpecSchema = z.object({
  name: z.string().min(1),
  label: z.string().optional(),
  semanticType: z.string().min(1),
  required: z.boolean().default(false),
  constraints: fieldConstraintsSchema.default({}),
  locator: z.string().min(1)
});

export const formMetadataSchema = z
  .object({
    id: z.string().min(1),
    url: z.string().url(),
    title: z.string().optional(),
    fields: z.array(fieldSpecSchema),
    submitLocator: z.string().min(1)
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    for (const field of value.fields) {
      if (seen.has(field.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate field name: ${field.name}` });
      }
      seen.add(field.name);
    }
  });

export type Scenario = z.infer<typeof scenarioSchema>;
export type FieldConstraints = z.infer<typeof fieldConstraintsSchema>;
export type FieldSpec = z.infer<typeof fieldSpecSchema>;
export type FormMetadata = z.infer<typeof formMetadataSchema>;

export function isSemanticType(value: string): value is SemanticType {
  return SEMANTIC_TYPES.some((type) => type === value);
}

const fieldValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.array(z.string())]);

const generatedValueBase = {
  fieldName: z.string().min(1),
  scenario: scenarioSchema,
  variant: z
    .enum(['primary', 'lower-inclusive', 'upper-inclusive', 'lower-exceeded', 'upper-exceeded'])
    .default('primary'),
  rationale: z.string().default('')
};

export const generatedValueSchema = z.discriminatedUnion('applicable', [
  z.object({
    ...generatedValueBase,
    applicable: z.literal(true),
    value: fieldValueSchema,
    expectedOutcome: z.enum(['accept', 'reject']),
    violation: z
      .enum(['option-membership', 'range', 'numeric-type', 'format', 'pattern', 'min-length', 'max-length', 'required'])
      .optional()
  }),
  z.object({
    ...generatedValueBase,
    applicable: z.literal(false),
    value: z.null(),
    expectedOutcome: z.literal('accept')
  })
]);

export const generatedValuesSchema = z.array(generatedValueSchema);

const stepResultSchema = z.object({
  fieldName: z.string(),
  semanticType: z.string(),
  action: z.enum(['fill', 'select', 'check', 'upload', 'skip']),
  status: z.enum(['ok', 'elementNotFound', 'valueRejectedByUI', 'timeout']),
  timestampOffset: z.number(),
  detail: z.string().optional()
});

const screenshotSchema = z.object({
  stage: z.enum(['before', 'after', 'error']),
  label: z.enum(['before', 'after-fill', 'after-submit', 'error']),
  ref: z.string(),
  capturedAt: z.string()
});

/** Shape of a persisted TestRun.json. */
export const testRunSchema = z.object({
  id: z.string().min(1),
  metadataRef: z.string(),
  scenario: scenarioSchema,
  status: z.enum(['pending', 'running', 'passed', 'failed', 'errored', 'cancelled']),
  steps: z.array(stepResultSchema),
  screenshots: z.array(screenshotSchema),
  values: generatedValuesSchema,
  submission: z.object({
    clicked: z.boolean(),
    outcome: z.enum(['success', 'validationError', 'unknown']).nullable()
  }),
  createdAt: z.string(),
  startedAt: z.string().nullable(),
  finishedAt: z.string().nullable(),
  durationMs: z.number().nullable(),
  errorSummary: z.string().nullable(),
  cancelCause: z.enum(['requested', 'timeout']).nullable()
});
