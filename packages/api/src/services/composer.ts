import { escapeRegExp, type Chunk, type GenerationParams, type GenerationRequest, type Lens } from '@groundwork/shared';
import { PASSAGE_PLACEHOLDER, TITLE_PLACEHOLDER } from './lenses';

/**
 * Prompt Composer
 *
 * Pure: the same chunk, lens, overrides and context always give the same
 * request. Run-level overrides win over lens defaults; an override left
 * undefined keeps the lens value.
 */

const PLACEHOLDERS = new RegExp(
  [PASSAGE_PLACEHOLDER, TITLE_PLACEHOLDER].map(escapeRegExp).join('|'),
  'g'
);

export type ParamOverrides = Partial<GenerationParams>;

export interface ComposeContext {
  title: string;
}

export function mergeParams(defaults: Readonly<GenerationParams>, overrides: ParamOverrides = {}): GenerationParams {
  const merged: GenerationParams = { ...defaults, ...(defaults.stop && { stop: [...defaults.stop] }) };
  if (overrides.temperature !== undefined) merged.temperature = overrides.temperature;
  if (overrides.maxOutputTokens !== undefined) merged.maxOutputTokens = overrides.maxOutputTokens;
  if (overrides.topP !== undefined) merged.topP = overrides.topP;
  if (overrides.stop !== undefined) merged.stop = [...overrides.stop];
  return merged;
}

export function composeRequest(
  chunk: Chunk,
  lens: Lens,
  overrides: ParamOverrides = {},
  context: ComposeContext = { title: chunk.sourceId }
): GenerationRequest {
  // Single pass, so placeholders inside the passage or title stay literal
  const prompt = lens.template.replace(PLACEHOLDERS, (placeholder) =>
    placeholder === PASSAGE_PLACEHOLDER ? chunk.text.trim() : context.title
  );

  return {
    prompt,
    ...(lens.system !== undefined && { system: lens.system }),
    ...(lens.examples !== undefined && { examples: lens.examples.map((message) => ({ ...message })) }),
    ...(lens.prefill !== undefined && { prefill: lens.prefill }),
    params: mergeParams(lens.params, overrides),
    lensName: lens.name,
    sourceId: chunk.sourceId,
    chunkIndex: chunk.index,
  };
}
