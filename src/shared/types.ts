// ============================================================================
// Question Types
// ============================================================================

export const ANSWER_TYPES = ['free_text', 'single_choice', 'multiple_choice', 'numeric'] as const;

export type AnswerType = (typeof ANSWER_TYPES)[number];

export type AnswerValue = string | number | string[];

export interface QuestionOption {
  value: string;
  label: string;
}

/**
 * Applicability rule: the question only exists in a session once the trigger
 * question has been answered with `equals` (or, for multiple choice, an answer
 * that includes it).
 */
export interface QuestionCondition {
  questionId: string;
  equals: string;
}

export interface Question {
  id: string;
  prompt: string;
  type: AnswerType;
  options?: QuestionOption[];
  isCompulsory: boolean;
  condition?: QuestionCondition;
  symptomTags?: string[];
  patientField?: string; // e.g. "name", "age", "gender"
  min?: number;
  max?: number;
}

/** What clients see of a question. */
export interface QuestionView {
  id: string;
  prompt: string;
  type: AnswerType;
  options?: QuestionOption[];
  isCompulsory: boolean;
}

// ============================================================================
// Decision Tree Types
// ============================================================================

// Ordered from least to most urgent
export const URGENCY_LEVELS = ['green_home_care', 'yellow_doctor_visit', 'red_emergency'] as const;

export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

export const SEVERITIES = ['mild', 'moderate', 'severe'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface SymptomDefinition {
  name: string;
  label: string;
  keywords: string[];
  followUpQuestions: string[];
  defaultUrgency: UrgencyLevel;
  redFlags: string[];
  analysisHints?: string;
  suggestedAdvice?: string;
}

export interface SymptomMatch {
  symptom: string;
  keyword: string;
  position: number;
}

// ============================================================================
// Session Types
// ============================================================================

export type SessionStatus = 'in_progress' | 'completed';

export type AnswerSource = 'profile' | 'patient';

export interface AnswerRecord {
  questionId: string;
  value: AnswerValue;
  source: AnswerSource;
  answeredAt: string;
}

/** Answers keyed by question id, used to pre-fill non-compulsory questions. */
export type ProfileHints = Record<string, AnswerValue>;

export interface AssessmentSession {
  id: string;
  status: SessionStatus;
  baseSequence: string[];
  insertionQueue: string[];
  answers: AnswerRecord[];
  cursor: number;
  matchedSymptoms: string[];
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  report?: ReportResult;
}

export interface SessionProgress {
  answered: number;
  total: number;
}

// ============================================================================
// Report Types
// ============================================================================

export interface PatientInfo {
  name?: string;
  age?: number;
  gender?: string;
  [field: string]: string | number | undefined;
}

export interface NarrativeEntry {
  questionId: string;
  question: string;
  answer: string;
  symptomTags: string[];
}

export interface GuidanceBundle {
  matchedSymptoms: string[];
  labels: string[];
  defaultUrgency: UrgencyLevel;
  redFlags: string[];
  analysisHints: string[];
  suggestedAdvice: string[];
}

export interface ReportRequest {
  sessionId: string;
  assessmentTopic: string;
  patientInfo: PatientInfo;
  medicalHistory: string[];
  narrative: NarrativeEntry[];
  guidance: GuidanceBundle;
  emergencyKeywordsDetected: string[];
  disclaimer: string;
}

export interface PossibleCause {
  id?: string;
  title: string;
  short_description?: string;
  subtitle?: string;
  severity: Severity;
  probability: number;
  detail?: {
    about_this?: string[];
    how_common?: {
      percentage?: number;
      description?: string;
    };
    what_you_can_do_now?: string[];
    warning?: string;
  };
}

export interface ReportResult {
  report_id: string;
  session_id: string;
  generated_at: string;
  assessment_topic: string;
  patient_info: PatientInfo;
  summary: string[];
  possible_causes: PossibleCause[];
  advice: string[];
  urgency_level: UrgencyLevel;
}

/**
 * The external text-generation collaborator. Returns its raw structured
 * payload; validation happens in the report assembler.
 */
export interface ReportGenerator {
  generate(request: ReportRequest): Promise<unknown>;
}

// ============================================================================
// Follow-up Chat Types
// ============================================================================

export const CHAT_ROLES = ['user', 'assistant'] as const;
export type ChatRole = (typeof CHAT_ROLES)[number];

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  sessionId: string;
  system: string;
  messages: ChatMessage[];
}

/**
 * Answers follow-up questions about a stored report. Stateless: the whole
 * context travels with every request.
 */
export interface ChatResponder {
  respond(request: ChatRequest): Promise<string>;
}

// ============================================================================
// AI Types
// ============================================================================

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface AIResponse {
  content: string;
  usage: TokenUsage;
  model: string;
  latencyMs: number;
}

// ============================================================================
// API Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  correlationId?: string;
}
