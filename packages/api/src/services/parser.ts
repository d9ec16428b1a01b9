import {
  collapseWhitespace,
  escapeRegExp,
  normalizeContent,
  type AlternatingShape,
  type DialogueTurn,
  type LabeledShape,
  type Lens,
  type ListShape,
  type Role,
  type RoleMap,
  type SingleShape,
} from '@groundwork/shared';
import { ParseError } from '../utils/errors';

/**
 * Response Parser
 *
 * Turns free-form backend output into dialogue turns according to the
 * lens's declared shape:
 *
 * - labeled:     lines opening with a bracketed label ("[Teacher] ...")
 *                start a turn; labels map to roles through the lens table
 * - alternating: turns separated by a separator line, roles alternate
 * - list:        bullet/numbered items, one user question + one answer
 * - single:      the whole output answers one fixed question
 *
 * Role sequences are never repaired: a dialog that does not alternate is
 * rejected as a whole.
 */

export type ParseTarget = Pick<Lens, 'shape' | 'roles' | 'prefill'>;

// Text after an end-of-sequence token is generation noise
const END_TOKENS = ['</s>', '<|im_end|>', '<|eot_id|>', '<|endoftext|>'];

const LIST_ITEM = /^\s*(?:[-*•+]|\d{1,3}[.)])\s+(.*)$/;

export function parseResponse(raw: string, target: ParseTarget): DialogueTurn[] {
  const text = cutAtEndToken(withPrefill(raw.replace(/\r\n?/g, '\n'), target.prefill));
  const { shape } = target;

  switch (shape.kind) {
    case 'labeled':
      return parseLabeled(text, shape, target.roles);
    case 'alternating':
      return parseAlternating(text, shape);
    case 'list':
      return parseList(text, shape);
    case 'single':
      return parseSingle(text, shape);
  }
}

/**
 * Inverse of parseResponse for turns it produced: parsing the rendered
 * text through the same lens yields the same turns.
 */
export function renderTurns(turns: readonly DialogueTurn[], target: ParseTarget): string {
  const { shape } = target;

  switch (shape.kind) {
    case 'labeled': {
      const labels = labelsByRole(target.roles);
      return turns.map((turn) => `[${labels[turn.role]}] ${turn.content}`).join('\n\n');
    }
    case 'alternating':
      return turns.map((turn) => turn.content).join(`\n${shape.separator}\n`);
    case 'list':
    case 'single':
      return turns
        .filter((turn) => turn.role === 'assistant')
        .map((turn) => turn.content)
        .join('\n\n');
  }
}

// The backend continues the prefilled reply, so the opening is missing from its text
function withPrefill(text: string, prefill: string | undefined): string {
  if (!prefill || text.trimStart().startsWith(prefill.trim())) {
    return text;
  }
  return prefill + text;
}

function cutAtEndToken(text: string): string {
  let end = text.length;
  for (const token of END_TOKENS) {
    const at = text.indexOf(token);
    if (at !== -1 && at < end) {
      end = at;
    }
  }
  return text.slice(0, end);
}

function markerPattern(roles: RoleMap): RegExp {
  const alternatives = Object.keys(roles)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  // "[Teacher]", "**[Teacher]**", "[Teacher]:" all open a turn
  return new RegExp(`^[ \\t]*[*_]*\\[(${alternatives})\\][*_]*:?[*_]*[ \\t]*`, 'i');
}

function labelsByRole(roles: RoleMap): Record<Role, string> {
  const labels: Record<Role, string> = { user: 'user', assistant: 'assistant' };
  const seen = new Set<Role>();
  for (const [label, role] of Object.entries(roles)) {
    if (!seen.has(role)) {
      labels[role] = label;
      seen.add(role);
    }
  }
  return labels;
}

function parseLabeled(text: string, shape: LabeledShape, roles: RoleMap): DialogueTurn[] {
  const byLabel = new Map(Object.entries(roles).map(([label, role]) => [label.toLowerCase(), role]));
  if (byLabel.size === 0) {
    throw new ParseError('NoMarkersFound', 'Lens declares no role labels');
  }
  const marker = markerPattern(roles);

  const open: Array<{ role: Role; lines: string[] }> = [];
  for (const line of text.split('\n')) {
    const match = marker.exec(line);
    const role = match ? byLabel.get(match[1].toLowerCase()) : undefined;
    if (match && role) {
      open.push({ role, lines: [line.slice(match[0].length)] });
    } else if (open.length > 0) {
      open[open.length - 1].lines.push(line);
    }
    // lines before the first marker are preamble
  }

  if (open.length === 0) {
    throw new ParseError('NoMarkersFound', `No role markers found (expected ${Object.keys(roles).join(', ')})`);
  }

  const turns: DialogueTurn[] = open.map(({ role, lines }) => ({
    role,
    content: normalizeContent(lines.join('\n')),
  }));

  // The text ended right after a marker
  if (turns[turns.length - 1].content === '') {
    turns.pop();
  }

  if (shape.alternating) {
    assertAlternation(turns, shape.asker);
  }

  if (shape.trimUnanswered && turns.length > 0 && turns[turns.length - 1].role === shape.asker) {
    turns.pop();
  }

  if (turns.length < shape.minTurns) {
    throw new ParseError('TooFewTurns', `Expected at least ${shape.minTurns} turns, found ${turns.length}`);
  }
  return turns;
}

function assertAlternation(turns: readonly DialogueTurn[], asker: Role): void {
  if (turns.length > 0 && turns[0].role !== asker) {
    throw new ParseError(
      'RoleSequenceViolation',
      `Dialog must open with the ${asker} role, found ${turns[0].role}`
    );
  }
  for (let i = 1; i < turns.length; i++) {
    if (turns[i].role === turns[i - 1].role) {
      throw new ParseError(
        'RoleSequenceViolation',
        `Turns ${i - 1} and ${i} both have role ${turns[i].role}`
      );
    }
  }
}

function parseAlternating(text: string, shape: AlternatingShape): DialogueTurn[] {
  const blocks: string[][] = [[]];
  for (const line of text.split('\n')) {
    if (line.trim() === shape.separator) {
      blocks.push([]);
    } else {
      blocks[blocks.length - 1].push(line);
    }
  }

  const contents = blocks.map((lines) => normalizeContent(lines.join('\n')));
  // Separators before the first or after the last turn carry nothing
  while (contents.length > 0 && contents[0] === '') contents.shift();
  while (contents.length > 0 && contents[contents.length - 1] === '') contents.pop();

  if (contents.length === 0) {
    throw new ParseError('EmptyOutput', 'Response contains no text');
  }

  const other: Role = shape.firstRole === 'user' ? 'assistant' : 'user';
  const turns = contents.map((content, i): DialogueTurn => ({
    role: i % 2 === 0 ? shape.firstRole : other,
    content,
  }));

  if (turns.length < shape.minTurns) {
    throw new ParseError('TooFewTurns', `Expected at least ${shape.minTurns} turns, found ${turns.length}`);
  }
  return turns;
}

function parseList(text: string, shape: ListShape): DialogueTurn[] {
  const items: string[] = [];
  let continuing = false;

  for (const line of text.split('\n')) {
    const match = LIST_ITEM.exec(line);
    if (match) {
      items.push(match[1]);
      continuing = true;
    } else if (line.trim() === '') {
      continuing = false;
    } else if (items.length > 0 && (continuing || /^\s/.test(line))) {
      // wrapped or indented continuation of the previous item
      items[items.length - 1] += ` ${line}`;
      continuing = true;
    }
  }

  const cleaned = items.map(collapseWhitespace).filter((item) => item !== '');
  if (cleaned.length === 0) {
    throw new ParseError('NoMarkersFound', 'No list items found');
  }
  if (cleaned.length < shape.minItems) {
    throw new ParseError('TooFewTurns', `Expected at least ${shape.minItems} list items, found ${cleaned.length}`);
  }

  return [
    { role: 'user', content: shape.question.trim() },
    { role: 'assistant', content: cleaned.map((item) => `- ${item}`).join('\n') },
  ];
}

function parseSingle(text: string, shape: SingleShape): DialogueTurn[] {
  const content = normalizeContent(text);
  if (content === '') {
    throw new ParseError('EmptyOutput', 'Response contains no text');
  }
  return [
    { role: 'user', content: shape.question.trim() },
    { role: 'assistant', content },
  ];
}
