/** Dialogue states */
export type DialogueState =
  | 'GREETING'
  | 'PROBING_MOOD'
  | 'PROBING_INTENSITY'
  | 'PROBING_CONTEXT'
  | 'CONFIRMING'
  | 'RECOMMENDING'
  | 'FEEDBACK'
  | 'ENDED'
  | 'ABORTED'
  | 'TIMEOUT';

export const DIALOGUE_STATES: readonly DialogueState[] = [
  'GREETING',
  'PROBING_MOOD',
  'PROBING_INTENSITY',
  'PROBING_CONTEXT',
  'CONFIRMING',
  'RECOMMENDING',
  'FEEDBACK',
  'ENDED',
  'ABORTED',
  'TIMEOUT',
];

export type TerminalState = 'ENDED' | 'ABORTED' | 'TIMEOUT';

export const TERMINAL_STATES: readonly DialogueState[] = ['ENDED', 'ABORTED', 'TIMEOUT'];

export const PROBING_STATES: readonly DialogueState[] = [
  'PROBING_MOOD',
  'PROBING_INTENSITY',
  'PROBING_CONTEXT',
];

export function isTerminal(state: DialogueState): state is TerminalState {
  return TERMINAL_STATES.includes(state);
}

/** Closed set of user intents */
export type Intent =
  | 'MOOD_EXPRESSION'
  | 'MOOD_REQUEST'
  | 'MOOD_CORRECTION'
  | 'PREFERENCE_EXPRESSION'
  | 'PREFERENCE_CONSTRAINT'
  | 'GREETING'
  | 'CONFIRMATION'
  | 'NEGATION'
  | 'SKIP'
  | 'HELP'
  | 'PLAY_REQUEST'
  | 'SEARCH_REQUEST'
  | 'FEEDBACK_POSITIVE'
  | 'FEEDBACK_NEGATIVE'
  | 'CONTEXT_EXPRESSION'
  | 'CANCEL'
  | 'UNKNOWN';

export const INTENTS: readonly Intent[] = [
  'MOOD_EXPRESSION',
  'MOOD_REQUEST',
  'MOOD_CORRECTION',
  'PREFERENCE_EXPRESSION',
  'PREFERENCE_CONSTRAINT',
  'GREETING',
  'CONFIRMATION',
  'NEGATION',
  'SKIP',
  'HELP',
  'PLAY_REQUEST',
  'SEARCH_REQUEST',
  'FEEDBACK_POSITIVE',
  'FEEDBACK_NEGATIVE',
  'CONTEXT_EXPRESSION',
  'CANCEL',
  'UNKNOWN',
];

export type Locale = 'vi' | 'en';

export type MoodLabel = 'happy' | 'sad' | 'thoughtful' | 'chill' | 'energetic' | 'focused';

export const MOOD_LABELS: readonly MoodLabel[] = ['happy', 'sad', 'thoughtful', 'chill', 'energetic', 'focused'];

export function isMoodLabel(value: unknown): value is MoodLabel {
  return typeof value === 'string' && (MOOD_LABELS as readonly string[]).includes(value);
}

export type IntensityLabel = 'low' | 'medium' | 'high';

export const INTENSITY_LABELS: readonly IntensityLabel[] = ['low', 'medium', 'high'];

export type InputType = 'text' | 'chip';

// ───── Per-turn signals ─────

export interface EmotionalSignals {
  mood: MoodLabel | null;
  confidence: number;
  intensity: IntensityLabel | null;
  intensityConfidence: number;
  /** A mood keyword was present but negated ("không buồn") */
  negated: boolean;
  explicit: boolean;
  keywords: string[];
}

export type TimeOfDay = 'morning' | 'afternoon' | 'evening' | 'night';

export interface ContextSignals {
  timeOfDay: TimeOfDay;
  activity: string | null;
  social: string | null;
}

// ───── Accumulated emotional state ─────

export type MoodSource = 'text' | 'chip' | 'correction';

export interface MoodHistoryEntry {
  mood: MoodLabel | 'none';
  intensity: IntensityLabel | null;
  confidence: number;
  turnIndex: number;
  timestamp: number;
  source: MoodSource;
}

export interface EmotionalContext {
  /** -1..1 */
  valence: number;
  /** 0..1 */
  arousal: number;
  moodHistory: MoodHistoryEntry[];
  consistency: number;
  dominantMood: MoodLabel | null;
  dominantIntensity: IntensityLabel | null;
  moodConfidence: number;
  context: ContextSignals | null;
}

// ───── Clarity ─────

export type ClarityComponent = 'mood' | 'intensity' | 'confidence' | 'context' | 'consistency';

export const CLARITY_COMPONENTS: readonly ClarityComponent[] = [
  'mood',
  'confidence',
  'intensity',
  'context',
  'consistency',
];

export type ClarityWeights = Record<ClarityComponent, number>;

export type ClarityLevel = 'high' | 'medium' | 'low' | 'insufficient';

export interface ClarityResult {
  score: number;
  level: ClarityLevel;
  components: Record<ClarityComponent, number>;
  weights: ClarityWeights;
}

// ───── Classification ─────

export interface IntentResult {
  intent: Intent;
  confidence: number;
  /** Matched text span, absent for UNKNOWN */
  matched?: string;
}

// ───── Responses ─────

export type ResponseType =
  | 'greeting'
  | 'probing'
  | 'confirmation'
  | 'recommendation'
  | 'clarification'
  | 'feedback_ack'
  | 'farewell';

export interface EnrichedRequest {
  sessionId: string;
  userId: string;
  mood: MoodLabel;
  intensity: IntensityLabel;
  confidence: number;
  valence: number;
  arousal: number;
  context: ContextSignals | null;
  source: 'conversation' | 'chip' | 'skip' | 'budget_exhausted';
}

export interface TurnResponse {
  sessionId: string;
  turnIndex: number;
  dialogueState: DialogueState;
  botMessage: string;
  responseType: ResponseType;
  shouldRecommend: boolean;
  clarityScore: number;
  detectedMood: MoodLabel | null;
  detectedIntensity: IntensityLabel | null;
  enrichedRequest?: EnrichedRequest;
}

export interface TurnRequest {
  userId: string;
  inputText: string;
  sessionId?: string;
  idempotencyKey?: string;
  inputType?: InputType;
  /** Mood picked from a fixed chip list; only read when inputType is 'chip' */
  moodChip?: MoodLabel;
}
