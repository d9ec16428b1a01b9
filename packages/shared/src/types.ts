/**
 * Core types for Groundwork.
 * Shared by the pipeline services and the HTTP surface.
 */

export type SourceType = 'book' | 'code' | 'paper' | 'legal' | 'transcript' | 'other';

export interface DocumentMetadata {
  title?: string;
  sourceType?: SourceType;
  [key: string]: unknown;
}

export interface SourceDocument {
  readonly id: string;
  readonly text: string;
  readonly metadata?: Readonly<DocumentMetadata>;
}

export type BoundaryPreference = 'none' | 'sentence' | 'paragraph';

export interface ChunkingOptions {
  size: number; // characters per chunk
  overlap: number; // characters shared with the previous chunk
  boundary: BoundaryPreference;
}

export interface Chunk {
  readonly sourceId: string;
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly overlap: number; // 0 for the first chunk
}

export type Role = 'user' | 'assistant';

/**
 * Maps a lens-specific label (e.g. "Student") onto the fixed role set.
 */
export type RoleMap = Readonly<Record<string, Role>>;

/**
 * A prior message sent ahead of the prompt (few-shot examples).
 */
export interface ChatMessage {
  readonly role: Role;
  readonly content: string;
}

export interface LabeledShape {
  kind: 'labeled';
  minTurns: number;
  alternating: boolean;
  asker: Role;
  trimUnanswered: boolean;
}

export interface AlternatingShape {
  kind: 'alternating';
  separator: string;
  firstRole: Role;
  minTurns: number;
}

export interface ListShape {
  kind: 'list';
  question: string;
  minItems: number;
}

export interface SingleShape {
  kind: 'single';
  question: string;
}

export type OutputShape = LabeledShape | AlternatingShape | ListShape | SingleShape;

export interface GenerationParams {
  temperature: number;
  maxOutputTokens: number;
  topP?: number;
  stop?: string[];
}

export interface Lens {
  readonly name: string;
  readonly description: string;
  readonly template: string;
  readonly system?: string;
  readonly examples?: readonly ChatMessage[];
  readonly prefill?: string; // opening of the assistant reply, continued by the backend
  readonly shape: Readonly<OutputShape>;
  readonly roles: RoleMap;
  readonly params: Readonly<GenerationParams>;
}

export interface GenerationRequest {
  readonly prompt: string;
  readonly system?: string;
  readonly examples?: readonly ChatMessage[];
  readonly prefill?: string;
  readonly params: Readonly<GenerationParams>;
  readonly lensName: string;
  readonly sourceId: string;
  readonly chunkIndex: number;
}

export interface DialogueTurn {
  readonly role: Role;
  readonly content: string;
}

export interface Provenance {
  readonly sourceId: string;
  readonly chunkIndex: number;
  readonly lensName: string;
}

export interface TrainingRecord {
  readonly turns: readonly DialogueTurn[];
  readonly provenance: Provenance;
}

export type GenerationErrorKind = 'Timeout' | 'RateLimited' | 'BackendUnavailable' | 'AuthError';

export type ParseErrorReason =
  | 'NoMarkersFound'
  | 'RoleSequenceViolation'
  | 'TooFewTurns'
  | 'EmptyOutput';

export type ValidationErrorReason = 'EmptyContent' | 'BlankTurn' | 'TooShort';

export type FailureKind =
  | Exclude<GenerationErrorKind, 'AuthError'>
  | ParseErrorReason
  | ValidationErrorReason;

export interface FailedItem {
  provenance: Provenance;
  stage: 'generation' | 'parse' | 'validation';
  kind: FailureKind;
  message: string;
}

export type RunStatus = 'completed' | 'cancelled' | 'aborted';

export interface RunReport {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  documents: number;
  chunks: number;
  skippedChunks: number;
  workItems: number;
  admitted: number;
  accepted: number;
  duplicates: number;
  cancelled: number;
  retries: number;
  failures: Partial<Record<FailureKind, number>>;
  failed: FailedItem[];
}

export interface RunResult {
  report: RunReport;
  records: TrainingRecord[];
}
