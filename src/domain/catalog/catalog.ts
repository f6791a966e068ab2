import type {
  AnswerValue,
  Question,
  QuestionCondition,
  QuestionView,
  SymptomDefinition,
  SymptomMatch,
} from '../../shared/types';
import { AppError } from '../../shared/errors';
import { DecisionTreeIndex } from './decision-tree';

export interface CatalogData {
  primarySymptomQuestionId: string;
  medicalHistoryQuestionId?: string;
  baseSequence: string[];
  questions: Question[];
  symptoms: SymptomDefinition[];
  emergencyKeywords: string[];
  disclaimer: string;
  version?: string;
}

export interface CatalogStats {
  version?: string;
  questions: number;
  baseQuestions: number;
  compulsoryBaseQuestions: number;
  conditionalQuestions: number;
  symptoms: number;
  keywords: number;
}

export function conditionMatches(condition: QuestionCondition, value: AnswerValue): boolean {
  if (Array.isArray(value)) {
    return value.includes(condition.equals);
  }
  return String(value) === condition.equals;
}

export function toQuestionView(question: Question): QuestionView {
  return {
    id: question.id,
    prompt: question.prompt,
    type: question.type,
    ...(question.options && { options: question.options.map((o) => ({ ...o })) }),
    isCompulsory: question.isCompulsory,
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Read-only view over a validated question catalog and decision tree.
 * Construct through `load()`; nothing here re-checks integrity.
 */
export class CatalogHandle {
  readonly primarySymptomQuestionId: string;
  readonly medicalHistoryQuestionId?: string;
  readonly emergencyKeywords: readonly string[];
  readonly disclaimer: string;
  readonly version?: string;

  private readonly questions: ReadonlyMap<string, Question>;
  private readonly base: readonly Question[];
  private readonly conditionalsByTrigger: ReadonlyMap<string, readonly Question[]>;
  private readonly tree: DecisionTreeIndex;

  constructor(data: CatalogData) {
    const frozen = deepFreeze(data);

    const questions = new Map<string, Question>();
    for (const question of frozen.questions) {
      questions.set(question.id, question);
    }

    const conditionals = new Map<string, Question[]>();
    for (const question of frozen.questions) {
      if (!question.condition) continue;
      const list = conditionals.get(question.condition.questionId) ?? [];
      list.push(question);
      conditionals.set(question.condition.questionId, list);
    }

    const base: Question[] = [];
    for (const id of frozen.baseSequence) {
      const question = questions.get(id);
      if (question) base.push(question);
    }

    this.primarySymptomQuestionId = frozen.primarySymptomQuestionId;
    this.medicalHistoryQuestionId = frozen.medicalHistoryQuestionId;
    this.emergencyKeywords = frozen.emergencyKeywords;
    this.disclaimer = frozen.disclaimer;
    this.version = frozen.version;
    this.questions = questions;
    this.base = base;
    this.conditionalsByTrigger = conditionals;
    this.tree = new DecisionTreeIndex(frozen.symptoms, questions);
  }

  baseQuestions(): readonly Question[] {
    return this.base;
  }

  question(id: string): Question | undefined {
    return this.questions.get(id);
  }

  requireQuestion(id: string): Question {
    const question = this.questions.get(id);
    if (!question) {
      // Sessions only ever reference catalog ids, so this is a corrupted session
      throw new AppError(`Question ${id} is not in the catalog`, 500, 'UNKNOWN_QUESTION', false);
    }
    return question;
  }

  followUpsFor(symptomOrKeyword: string): Question[] {
    return this.tree.followUpsFor(symptomOrKeyword);
  }

  matchSymptoms(text: string): SymptomMatch[] {
    return this.tree.match(text);
  }

  symptom(name: string): SymptomDefinition | undefined {
    return this.tree.symptom(name);
  }

  /**
   * Conditional questions whose trigger is `questionId` and whose condition
   * holds for `value`, in catalog order.
   */
  conditionalsTriggeredBy(questionId: string, value: AnswerValue): Question[] {
    const candidates = this.conditionalsByTrigger.get(questionId) ?? [];
    return candidates.filter((q) => q.condition !== undefined && conditionMatches(q.condition, value));
  }

  stats(): CatalogStats {
    let conditionalQuestions = 0;
    for (const list of this.conditionalsByTrigger.values()) {
      conditionalQuestions += list.length;
    }

    return {
      version: this.version,
      questions: this.questions.size,
      baseQuestions: this.base.length,
      compulsoryBaseQuestions: this.base.filter((q) => q.isCompulsory).length,
      conditionalQuestions,
      symptoms: this.tree.allSymptoms().length,
      keywords: this.tree.keywordCount,
    };
  }
}
