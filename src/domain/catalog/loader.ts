import fs from 'fs';
import { z } from 'zod';
import type { ZodError } from 'zod';
import { ANSWER_TYPES, URGENCY_LEVELS } from '../../shared/types';
import type { Question, SymptomDefinition } from '../../shared/types';
import { SchemaError } from '../../shared/errors';
import { normalizeText } from '../../shared/validation';
import { logger } from '../../infra/logging/logger';
import { CatalogHandle } from './catalog';

// ============================================================================
// Source Schemas
// ============================================================================

const optionSchema = z.object({
  value: z.string().min(1),
  label: z.string().min(1),
});

const questionSchema = z.object({
  id: z.string().min(1),
  prompt: z.string().min(1),
  type: z.enum(ANSWER_TYPES),
  options: z.array(optionSchema).optional(),
  isCompulsory: z.boolean(),
  condition: z.object({
    questionId: z.string().min(1),
    equals: z.string().min(1),
  }).optional(),
  symptomTags: z.array(z.string().min(1)).optional(),
  patientField: z.string().min(1).optional(),
  min: z.number().finite().optional(),
  max: z.number().finite().optional(),
});

const catalogSourceSchema = z.object({
  version: z.string().optional(),
  primarySymptomQuestionId: z.string().min(1),
  medicalHistoryQuestionId: z.string().min(1).optional(),
  baseSequence: z.array(z.string().min(1)).min(1),
  questions: z.array(questionSchema).min(1),
});

const symptomSchema = z.object({
  label: z.string().min(1),
  keywords: z.array(z.string()).min(1),
  followUpQuestions: z.array(z.string().min(1)),
  defaultUrgency: z.enum(URGENCY_LEVELS).default('green_home_care'),
  redFlags: z.array(z.string()).default([]),
  analysisHints: z.string().optional(),
  suggestedAdvice: z.string().optional(),
});

const decisionTreeSourceSchema = z.object({
  emergencyKeywords: z.array(z.string().min(1)).default([]),
  disclaimer: z.string().default(''),
  symptoms: z.record(symptomSchema),
});

export type CatalogSource = z.input<typeof catalogSourceSchema>;
export type DecisionTreeSource = z.input<typeof decisionTreeSourceSchema>;

function describeIssues(source: string, error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${source} ${where}: ${issue.message}`;
  });
}

// ============================================================================
// Integrity Checks
// ============================================================================

const CHOICE_TYPES = new Set(['single_choice', 'multiple_choice']);

function checkQuestions(questions: Question[], problems: string[]): Map<string, Question> {
  const byId = new Map<string, Question>();

  for (const question of questions) {
    if (byId.has(question.id)) {
      problems.push(`duplicate question id ${question.id}`);
      continue;
    }
    byId.set(question.id, question);

    const isChoice = CHOICE_TYPES.has(question.type);
    if (isChoice) {
      if (!question.options || question.options.length === 0) {
        problems.push(`question ${question.id} is ${question.type} but has no options`);
      } else {
        const values = question.options.map((o) => o.value);
        if (new Set(values).size !== values.length) {
          problems.push(`question ${question.id} has duplicate option values`);
        }
      }
    } else if (question.options) {
      problems.push(`question ${question.id} is ${question.type} and must not declare options`);
    }

    if (question.min !== undefined && question.max !== undefined && question.min > question.max) {
      problems.push(`question ${question.id} has min greater than max`);
    }
  }

  return byId;
}

function checkBaseSequence(
  baseSequence: string[],
  designations: { primarySymptomQuestionId: string; medicalHistoryQuestionId?: string },
  byId: Map<string, Question>,
  problems: string[]
): void {
  const { primarySymptomQuestionId, medicalHistoryQuestionId } = designations;
  const seen = new Set<string>();

  for (const id of baseSequence) {
    if (seen.has(id)) {
      problems.push(`base sequence lists ${id} twice`);
    }
    seen.add(id);

    const question = byId.get(id);
    if (!question) {
      problems.push(`base sequence references unknown question ${id}`);
    } else if (question.condition) {
      problems.push(`conditional question ${id} cannot be part of the base sequence`);
    }
  }

  const primary = byId.get(primarySymptomQuestionId);
  if (!primary) {
    problems.push(`primary symptom question ${primarySymptomQuestionId} does not exist`);
  } else {
    if (!seen.has(primarySymptomQuestionId)) {
      problems.push(`primary symptom question ${primarySymptomQuestionId} is not in the base sequence`);
    }
    if (primary.type !== 'free_text') {
      problems.push(`primary symptom question ${primarySymptomQuestionId} must be free_text`);
    }
  }

  if (medicalHistoryQuestionId !== undefined) {
    const history = byId.get(medicalHistoryQuestionId);
    if (!history) {
      problems.push(`medical history question ${medicalHistoryQuestionId} does not exist`);
    } else if (history.type !== 'free_text') {
      problems.push(`medical history question ${medicalHistoryQuestionId} must be free_text`);
    }
  }
}

function checkConditions(
  questions: Question[],
  baseSequence: string[],
  byId: Map<string, Question>,
  problems: string[]
): void {
  const base = new Set(baseSequence);

  for (const question of questions) {
    if (!question.condition) continue;

    const { questionId, equals } = question.condition;
    const trigger = byId.get(questionId);

    if (!trigger) {
      problems.push(`question ${question.id} is conditional on unknown question ${questionId}`);
      continue;
    }
    if (trigger.condition) {
      problems.push(`question ${question.id} is conditional on ${questionId}, which is itself conditional`);
    }
    if (!base.has(questionId)) {
      problems.push(`question ${question.id} is conditional on ${questionId}, which is not a base question`);
    }
    if (trigger.options && !trigger.options.some((o) => o.value === equals)) {
      problems.push(`question ${question.id} expects ${questionId} = ${equals}, which is not an option`);
    }
  }
}

function checkDecisionTree(
  symptoms: SymptomDefinition[],
  byId: Map<string, Question>,
  problems: string[]
): void {
  const keywordOwner = new Map<string, string>();

  for (const symptom of symptoms) {
    for (const keyword of symptom.keywords) {
      const normalized = normalizeText(keyword);
      if (!normalized) {
        problems.push(`symptom ${symptom.name} has a blank keyword`);
        continue;
      }
      const owner = keywordOwner.get(normalized);
      if (owner && owner !== symptom.name) {
        problems.push(`keyword "${normalized}" is claimed by both ${owner} and ${symptom.name}`);
      }
      keywordOwner.set(normalized, symptom.name);
    }

    const seen = new Set<string>();
    for (const id of symptom.followUpQuestions) {
      if (seen.has(id)) {
        problems.push(`symptom ${symptom.name} lists follow-up ${id} twice`);
      }
      seen.add(id);

      const question = byId.get(id);
      if (!question) {
        problems.push(`symptom ${symptom.name} references unknown follow-up question ${id}`);
      } else if (question.condition) {
        problems.push(`symptom ${symptom.name} references conditional question ${id} as a follow-up`);
      }
    }
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate catalog and decision tree sources and build a read-only handle.
 * Throws SchemaError listing every problem found; nothing is partially loaded.
 */
export function load(catalogSource: unknown, decisionTreeSource: unknown): CatalogHandle {
  const catalogResult = catalogSourceSchema.safeParse(catalogSource);
  const treeResult = decisionTreeSourceSchema.safeParse(decisionTreeSource);

  const structural = [
    ...(catalogResult.success ? [] : describeIssues('catalog', catalogResult.error)),
    ...(treeResult.success ? [] : describeIssues('decision tree', treeResult.error)),
  ];
  if (!catalogResult.success || !treeResult.success) {
    throw new SchemaError(structural);
  }

  const catalog = catalogResult.data;
  const tree = treeResult.data;

  const symptoms: SymptomDefinition[] = Object.entries(tree.symptoms).map(([name, s]) => ({
    name,
    label: s.label,
    keywords: s.keywords,
    followUpQuestions: s.followUpQuestions,
    defaultUrgency: s.defaultUrgency,
    redFlags: s.redFlags,
    analysisHints: s.analysisHints,
    suggestedAdvice: s.suggestedAdvice,
  }));

  const problems: string[] = [];
  const byId = checkQuestions(catalog.questions, problems);
  checkBaseSequence(catalog.baseSequence, catalog, byId, problems);
  checkConditions(catalog.questions, catalog.baseSequence, byId, problems);
  checkDecisionTree(symptoms, byId, problems);

  if (problems.length > 0) {
    throw new SchemaError(problems);
  }

  return new CatalogHandle({
    version: catalog.version,
    primarySymptomQuestionId: catalog.primarySymptomQuestionId,
    medicalHistoryQuestionId: catalog.medicalHistoryQuestionId,
    baseSequence: catalog.baseSequence,
    questions: catalog.questions,
    symptoms,
    emergencyKeywords: tree.emergencyKeywords,
    disclaimer: tree.disclaimer,
  });
}

function readJson(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new SchemaError([`cannot read ${filePath}: ${err.message}`]);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new SchemaError([`${filePath} is not valid JSON: ${err.message}`]);
  }
}

export function loadCatalogFromFiles(paths: {
  catalogPath: string;
  decisionTreePath: string;
}): CatalogHandle {
  const catalog = load(readJson(paths.catalogPath), readJson(paths.decisionTreePath));

  logger.info({ ...catalog.stats(), ...paths }, 'Question catalog loaded');

  return catalog;
}
