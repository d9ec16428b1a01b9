import { readFile } from 'fs/promises';
import { z } from 'zod';
import { GENERATION_DEFAULTS, type Lens } from '@groundwork/shared';
import { ConfigError, UnknownLensError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Lens Catalog
 *
 * A lens is a registry entry: a prompt template with one {{passage}}
 * substitution point (and an optional {{title}}), the output shape the
 * response parser should expect, a label → role table and default
 * generation parameters.
 *
 * Adding a lens means adding an entry; parsing logic keys off the shape
 * variant, never off the lens name.
 */

export const PASSAGE_PLACEHOLDER = '{{passage}}';
export const TITLE_PLACEHOLDER = '{{title}}';

const RoleSchema = z.enum(['user', 'assistant']);

const ShapeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('labeled'),
    minTurns: z.number().int().min(1).default(2),
    alternating: z.boolean().default(true),
    asker: RoleSchema.default('user'),
    trimUnanswered: z.boolean().default(false),
  }),
  z.object({
    kind: z.literal('alternating'),
    separator: z.string().trim().min(1).default('---'),
    firstRole: RoleSchema.default('user'),
    minTurns: z.number().int().min(1).default(2),
  }),
  z.object({
    kind: z.literal('list'),
    question: z.string().min(1),
    minItems: z.number().int().min(1).default(1),
  }),
  z.object({
    kind: z.literal('single'),
    question: z.string().min(1),
  }),
]);

const ParamsSchema = z.object({
  temperature: z.number().min(0).max(2).default(GENERATION_DEFAULTS.TEMPERATURE),
  maxOutputTokens: z.number().int().positive().default(GENERATION_DEFAULTS.MAX_OUTPUT_TOKENS),
  topP: z.number().gt(0).max(1).optional(),
  stop: z.array(z.string().min(1)).max(4).optional(),
});

export const LensDefinitionSchema = z
  .object({
    name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lens names are lowercase slugs'),
    description: z.string().default(''),
    template: z.string().min(1),
    system: z.string().min(1).optional(),
    examples: z.array(z.object({ role: RoleSchema, content: z.string().min(1) })).optional(),
    prefill: z.string().min(1).optional(),
    shape: ShapeSchema,
    roles: z.record(z.string().min(1), RoleSchema).default({}),
    params: ParamsSchema.default({}),
  })
  .superRefine((lens, ctx) => {
    const occurrences = lens.template.split(PASSAGE_PLACEHOLDER).length - 1;
    if (occurrences !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['template'],
        message: `template must contain ${PASSAGE_PLACEHOLDER} exactly once (found ${occurrences})`,
      });
    }
    if (lens.examples && lens.examples.length > 0) {
      // The prompt follows as a user message, so the examples end on the assistant
      lens.examples.forEach((message, i) => {
        const expected = i % 2 === 0 ? 'user' : 'assistant';
        if (message.role !== expected) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['examples', i, 'role'],
            message: `examples must alternate user/assistant starting with user (expected ${expected})`,
          });
        }
      });
      if (lens.examples.length % 2 !== 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['examples'],
          message: 'examples must end with an assistant message',
        });
      }
    }
    if (lens.shape.kind === 'labeled') {
      const mapped = new Set(Object.values(lens.roles));
      if (mapped.size < 2 && lens.shape.alternating) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['roles'],
          message: 'an alternating labeled shape needs labels for both user and assistant',
        });
      }
      if (!mapped.has(lens.shape.asker)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['roles'],
          message: `no label maps to the asker role "${lens.shape.asker}"`,
        });
      }
    }
  });

export type LensDefinition = z.input<typeof LensDefinitionSchema>;

const LensFileSchema = z.object({ lenses: z.array(z.unknown()) });

function toLens(definition: unknown): Lens {
  const parsed = LensDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid lens definition: ${issues.join('; ')}`);
  }
  return Object.freeze(parsed.data);
}

export class LensCatalog {
  private constructor(private readonly lenses: ReadonlyMap<string, Lens>) {}

  static fromDefinitions(definitions: readonly unknown[]): LensCatalog {
    return new LensCatalog(new Map()).extend(definitions);
  }

  /**
   * New catalog with extra lenses. Existing entries cannot be redefined.
   */
  extend(definitions: readonly unknown[]): LensCatalog {
    const next = new Map(this.lenses);
    for (const definition of definitions) {
      const lens = toLens(definition);
      if (next.has(lens.name)) {
        throw new ConfigError(`Duplicate lens name: "${lens.name}"`);
      }
      next.set(lens.name, lens);
    }
    return new LensCatalog(next);
  }

  get(name: string): Lens {
    const lens = this.lenses.get(name);
    if (!lens) {
      throw new UnknownLensError(name);
    }
    return lens;
  }

  has(name: string): boolean {
    return this.lenses.has(name);
  }

  /**
   * Resolve a list of names in order, failing on the first unknown one.
   */
  resolve(names: readonly string[]): Lens[] {
    return names.map((name) => this.get(name));
  }

  list(): Lens[] {
    return [...this.lenses.values()];
  }

  get size(): number {
    return this.lenses.size;
  }
}

const TEACHER_STUDENT_ROLES = { Student: 'user', Teacher: 'assistant' } as const;

export const BUILTIN_LENSES: readonly LensDefinition[] = [
  {
    name: 'dialog',
    description: 'Student asks questions, Teacher answers, grounded in the passage',
    template: `Read the following text and simulate a dialog between a Student and a Teacher. The Student asks intelligent questions that cover all the important knowledge in the passage. The Teacher gives long and thoughtful answers. Do not talk about the passage directly; ground every answer in it.

Start every turn on a new line with [Student] or [Teacher].

Context:

{{title}}

Passage:

{{passage}}`,
    shape: { kind: 'labeled', minTurns: 2, alternating: true, asker: 'user', trimUnanswered: false },
    roles: TEACHER_STUDENT_ROLES,
    params: { temperature: 0.7, maxOutputTokens: 1024 },
  },
  {
    name: 'lecture',
    description: 'Broad questions answered at length, like part of a lecture',
    template: `Good. For the next passage the Student asks broad, open-ended questions and the Teacher answers at great length, like part of a lecture, quoting the material where useful but never mentioning "the passage" itself. Do not infer beyond what the passage supports.

Context:

{{title}}

Passage:

{{passage}}`,
    examples: [
      {
        role: 'user',
        content: `Read the following text and simulate a dialog between a Student and a Teacher, grounded in the text but never mentioning it directly. Start every turn on a new line with [Student] or [Teacher]. Warm up with this short passage:

Early lighthouses burned wood or coal in open braziers on towers. In 1822 Augustin Fresnel described a lens built from concentric rings of glass prisms, which bent the light of a single lamp into a beam visible for more than twenty miles. Within a few decades most major coastal lights had been refitted with Fresnel lenses.`,
      },
      {
        role: 'assistant',
        content: `[Student] How were the first lighthouses lit?

[Teacher] They burned wood or coal in open braziers set on top of towers.

[Student] What changed that?

[Teacher] In 1822 Augustin Fresnel described a lens made of concentric rings of glass prisms. It bent the light of a single lamp into a beam that could be seen more than twenty miles away, and within a few decades most major coastal lights had been refitted with it.`,
      },
    ],
    prefill: '[Student] ',
    shape: { kind: 'labeled', minTurns: 2, alternating: true, asker: 'user', trimUnanswered: false },
    roles: TEACHER_STUDENT_ROLES,
    params: { temperature: 0.8, maxOutputTokens: 2048 },
  },
  {
    name: 'interview',
    description: 'An interviewer questions an expert on the material',
    template: `Write an interview in which an Interviewer questions an Expert about the material below. The Expert's answers must be supported by the material.

Start every turn on a new line with [Interviewer] or [Expert].

Source: {{title}}

Material:

{{passage}}`,
    shape: { kind: 'labeled', minTurns: 2, alternating: true, asker: 'user', trimUnanswered: false },
    roles: { Interviewer: 'user', Expert: 'assistant' },
    params: { temperature: 0.7, maxOutputTokens: 1024 },
  },
  {
    name: 'qa',
    description: 'Question/answer pairs separated by --- lines',
    template: `Write question and answer pairs about the passage below. Put the question first, then its answer. Put a line containing only --- between every question and answer and between pairs. Use no labels.

Passage:

{{passage}}`,
    shape: { kind: 'alternating', separator: '---', firstRole: 'user', minTurns: 2 },
    params: { temperature: 0.5, maxOutputTokens: 1024 },
  },
  {
    name: 'bullets',
    description: 'Key points as a bullet list',
    template: `List the key facts and ideas from the passage below as a bullet list, one "- " line per point. Write nothing else.

Passage:

{{passage}}`,
    shape: { kind: 'list', question: 'What are the key points of this material?', minItems: 2 },
    params: { temperature: 0.3, maxOutputTokens: 512 },
  },
  {
    name: 'summary',
    description: 'A single summary paragraph',
    template: `Summarize the passage below in one paragraph. Write only the summary.

Title: {{title}}

Passage:

{{passage}}`,
    shape: { kind: 'single', question: 'Can you summarize this material?' },
    params: { temperature: 0.3, maxOutputTokens: 512 },
  },
];

export function createDefaultCatalog(): LensCatalog {
  return LensCatalog.fromDefinitions(BUILTIN_LENSES);
}

/**
 * Load extra lenses from a JSON file of the form { "lenses": [...] }.
 */
export async function loadLensFile(path: string, base: LensCatalog = createDefaultCatalog()): Promise<LensCatalog> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read lens file ${path}: ${getErrorMessage(error)}`, { cause: error });
  }

  const parsed = LensFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Lens file ${path} must be an object with a "lenses" array`);
  }

  const catalog = base.extend(parsed.data.lenses);
  logger.info({ path, added: parsed.data.lenses.length, total: catalog.size }, 'Lens file loaded');
  return catalog;
}
