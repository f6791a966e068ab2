import { describe, expect, it } from 'vitest';
import type { AnswerValue, AssessmentSession, Question } from '../../shared/types';
import {
  InvalidAnswerValueError,
  OutOfOrderAnswerError,
  SessionAlreadyCompletedError,
} from '../../shared/errors';
import { catalogSource, decisionTreeSource, fixtureCatalog } from '../../test/fixtures';
import type { CatalogHandle } from '../catalog/catalog';
import { conditionMatches } from '../catalog/catalog';
import { load } from '../catalog/loader';
import { createSession, recordAnswer } from './engine';
import { answerFor, effectiveSequence, nextPending, nextPendingId, sessionProgress } from './session';

const NOW = new Date('2026-03-01T10:00:00.000Z');

function defaultValue(question: Question): AnswerValue {
  switch (question.type) {
    case 'free_text':
      return 'fine';
    case 'single_choice':
      return question.options?.[0]?.value ?? '';
    case 'multiple_choice':
      return [question.options?.[0]?.value ?? ''];
    case 'numeric':
      return question.min ?? 0;
  }
}

/** Answer every pending question, using `values` where given. */
function answerAll(
  catalog: CatalogHandle,
  start: AssessmentSession,
  values: Record<string, AnswerValue> = {}
): { session: AssessmentSession; asked: string[] } {
  let session = start;
  const asked: string[] = [];

  for (let question = nextPending(catalog, session); question; question = nextPending(catalog, session)) {
    asked.push(question.id);
    session = recordAnswer(catalog, session, question.id, values[question.id] ?? defaultValue(question), NOW);
  }
  return { session, asked };
}

describe('createSession', () => {
  it('starts with the full base sequence and no answers', () => {
    const catalog = fixtureCatalog();
    const session = createSession(catalog, {}, NOW);

    expect(session.status).toBe('in_progress');
    expect(session.baseSequence).toEqual(['q_name', 'q_age', 'q_complaint', 'q_gender', 'q_history']);
    expect(session.insertionQueue).toEqual([]);
    expect(session.cursor).toBe(0);
    expect(session.createdAt).toBe('2026-03-01T10:00:00.000Z');
    expect(nextPendingId(session)).toBe('q_name');
  });

  it('pre-fills non-compulsory questions and ignores other hints', () => {
    const catalog = fixtureCatalog();
    const session = createSession(catalog, { q_name: ' Ana ', q_age: '18_25', q_unknown: 'x' }, NOW);

    expect(session.baseSequence).toEqual(['q_age', 'q_complaint', 'q_gender', 'q_history']);
    expect(session.answers).toEqual([
      { questionId: 'q_name', value: 'Ana', source: 'profile', answeredAt: '2026-03-01T10:00:00.000Z' },
    ]);
    expect(nextPendingId(session)).toBe('q_age');
  });

  it('rejects an invalid pre-fill value', () => {
    expect(() => createSession(fixtureCatalog(), { q_history: '   ' })).toThrow(InvalidAnswerValueError);
  });

  it('runs conditional triggers for pre-filled answers', () => {
    const source = catalogSource();
    source.questions = source.questions.map((q) => (q.id === 'q_gender' ? { ...q, isCompulsory: false } : q));
    const catalog = load(source, decisionTreeSource());

    const session = createSession(catalog, { q_gender: 'female' }, NOW);

    expect(session.baseSequence).toEqual(['q_name', 'q_age', 'q_complaint', 'q_history']);
    expect(session.insertionQueue).toEqual(['q_pregnant', 'q_last_period']);
  });
});

describe('recordAnswer', () => {
  function atComplaint(): { catalog: CatalogHandle; session: AssessmentSession } {
    const catalog = fixtureCatalog();
    const started = createSession(catalog, { q_name: 'Ana' }, NOW);
    return { catalog, session: recordAnswer(catalog, started, 'q_age', '26_35', NOW) };
  }

  it('queues follow-ups in the order symptoms appear, without duplicates', () => {
    const { catalog, session } = atComplaint();

    const next = recordAnswer(catalog, session, 'q_complaint', 'I have a fever and chills', NOW);

    expect(next.matchedSymptoms).toEqual(['fever', 'chills']);
    expect(next.insertionQueue).toEqual(['fu_temperature', 'fu_fever_days', 'fu_shivering']);
    expect(nextPendingId(next)).toBe('q_gender');
  });

  it('follows text order rather than catalog order', () => {
    const { catalog, session } = atComplaint();

    const next = recordAnswer(catalog, session, 'q_complaint', 'Chills, then a fever', NOW);

    expect(next.insertionQueue).toEqual(['fu_temperature', 'fu_shivering', 'fu_fever_days']);
  });

  it('appends conditionals after queued follow-ups, once', () => {
    const { catalog, session } = atComplaint();
    const afterComplaint = recordAnswer(catalog, session, 'q_complaint', 'fever and chills', NOW);

    const next = recordAnswer(catalog, afterComplaint, 'q_gender', 'female', NOW);

    expect(next.insertionQueue).toEqual([
      'fu_temperature',
      'fu_fever_days',
      'fu_shivering',
      'q_pregnant',
      'q_last_period',
    ]);
    expect(new Set(effectiveSequence(next)).size).toBe(effectiveSequence(next).length);
  });

  it('matches a multi-word keyword split by a tab', () => {
    const tree = decisionTreeSource();
    tree.symptoms.headache.keywords = ['headache', 'head pain'];
    const catalog = load(catalogSource(), tree);
    const started = createSession(catalog, { q_name: 'Ana' }, NOW);
    const session = recordAnswer(catalog, started, 'q_age', '26_35', NOW);

    const next = recordAnswer(catalog, session, 'q_complaint', 'a sharp head\tpain', NOW);

    expect(next.matchedSymptoms).toEqual(['headache']);
    expect(next.insertionQueue).toEqual(['fu_location', 'fu_onset']);
    expect(answerFor(next, 'q_complaint')).toBe('a sharp head pain');
  });

  it('keeps conditionals queued once when their trigger is answered again', () => {
    const source = catalogSource();
    source.questions = source.questions.map((q) => (q.id === 'q_gender' ? { ...q, isCompulsory: false } : q));
    const catalog = load(source, decisionTreeSource());
    const prefilled = createSession(catalog, { q_gender: 'female' }, NOW);
    expect(prefilled.insertionQueue).toEqual(['q_pregnant', 'q_last_period']);

    // gender comes round a second time after being pre-filled
    let session: AssessmentSession = { ...prefilled, baseSequence: [...prefilled.baseSequence, 'q_gender'] };
    session = recordAnswer(catalog, session, 'q_name', 'Ana', NOW);
    session = recordAnswer(catalog, session, 'q_age', '26_35', NOW);
    session = recordAnswer(catalog, session, 'q_complaint', 'tired', NOW);
    session = recordAnswer(catalog, session, 'q_history', 'none', NOW);
    session = recordAnswer(catalog, session, 'q_gender', 'female', NOW);

    expect(session.insertionQueue).toEqual(['q_pregnant', 'q_last_period']);
    expect(nextPendingId(session)).toBe('q_pregnant');
    expect(effectiveSequence(session).filter((id) => id === 'q_pregnant')).toHaveLength(1);
  });

  it('does not insert conditionals for a non-matching answer', () => {
    const { catalog, session } = atComplaint();
    const afterComplaint = recordAnswer(catalog, session, 'q_complaint', 'a migraine', NOW);

    const next = recordAnswer(catalog, afterComplaint, 'q_gender', 'male', NOW);

    expect(next.insertionQueue).toEqual(['fu_location', 'fu_onset']);
  });

  it('only scans the primary symptom question for keywords', () => {
    const { catalog, session } = atComplaint();
    let current = recordAnswer(catalog, session, 'q_complaint', 'tired', NOW);
    current = recordAnswer(catalog, current, 'q_gender', 'male', NOW);

    const next = recordAnswer(catalog, current, 'q_history', 'had a fever last year', NOW);

    expect(next.insertionQueue).toEqual([]);
    expect(next.matchedSymptoms).toEqual([]);
    expect(next.status).toBe('completed');
  });

  it('rejects an out-of-order answer and leaves the session unchanged', () => {
    const catalog = fixtureCatalog();
    const session = createSession(catalog, { q_name: 'Ana' }, NOW);
    const before = structuredClone(session);

    let caught: unknown;
    try {
      recordAnswer(catalog, session, 'q_gender', 'female', NOW);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OutOfOrderAnswerError);
    expect(caught).toMatchObject({ expectedQuestionId: 'q_age', receivedQuestionId: 'q_gender' });
    expect(session).toEqual(before);
    expect(nextPendingId(session)).toBe('q_age');
  });

  it('leaves the session unchanged when the value is invalid', () => {
    const catalog = fixtureCatalog();
    const session = createSession(catalog, { q_name: 'Ana' }, NOW);
    const before = structuredClone(session);

    expect(() => recordAnswer(catalog, session, 'q_age', '99_100', NOW)).toThrow(InvalidAnswerValueError);
    expect(session).toEqual(before);
  });

  it('does not mutate the session it is given', () => {
    const { catalog, session } = atComplaint();
    const before = structuredClone(session);

    recordAnswer(catalog, session, 'q_complaint', 'fever', NOW);

    expect(session).toEqual(before);
  });

  it('completes once nothing is pending and then refuses answers', () => {
    const catalog = fixtureCatalog();
    const { session, asked } = answerAll(catalog, createSession(catalog, {}, NOW), {
      q_complaint: 'fever and chills',
      q_gender: 'female',
    });

    expect(asked).toEqual([
      'q_name',
      'q_age',
      'q_complaint',
      'q_gender',
      'q_history',
      'fu_temperature',
      'fu_fever_days',
      'fu_shivering',
      'q_pregnant',
      'q_last_period',
    ]);
    expect(session.status).toBe('completed');
    expect(session.completedAt).toBe('2026-03-01T10:00:00.000Z');
    expect(sessionProgress(session)).toEqual({ answered: 10, total: 10 });
    expect(nextPending(catalog, session)).toBeNull();

    expect(() => recordAnswer(catalog, session, 'q_name', 'Ana', NOW)).toThrow(SessionAlreadyCompletedError);
  });

  it('answers every compulsory question in the effective sequence before completing', () => {
    const catalog = fixtureCatalog();
    const { session } = answerAll(catalog, createSession(catalog, { q_history: 'asthma' }, NOW), {
      q_complaint: 'headache and fever',
      q_gender: 'female',
    });

    const compulsory = effectiveSequence(session).filter((id) => catalog.requireQuestion(id).isCompulsory);
    const answered = new Set(session.answers.map((a) => a.questionId));

    expect(session.status).toBe('completed');
    expect(compulsory.every((id) => answered.has(id))).toBe(true);
    expect(compulsory).toHaveLength(7);
  });
});

describe('conditionMatches', () => {
  it('uses membership for multiple choice answers', () => {
    const condition = { questionId: 'q', equals: 'jaw' };

    expect(conditionMatches(condition, ['left_arm', 'jaw'])).toBe(true);
    expect(conditionMatches(condition, ['left_arm'])).toBe(false);
    expect(conditionMatches({ questionId: 'q', equals: '3' }, 3)).toBe(true);
  });
});

describe('end to end', () => {
  it('asks 5 compulsory questions, the headache follow-ups and the two conditionals', () => {
    const optional = Array.from({ length: 18 }, (_, i) => `n_${String(i + 1).padStart(2, '0')}`);
    const compulsory: Question[] = [
      {
        id: 'c_age',
        prompt: 'Age?',
        type: 'single_choice',
        isCompulsory: true,
        patientField: 'age',
        options: [{ value: '26_35', label: '26-35' }],
      },
      { id: 'c_complaint', prompt: 'Complaint?', type: 'free_text', isCompulsory: true },
      {
        id: 'c_gender',
        prompt: 'Sex?',
        type: 'single_choice',
        isCompulsory: true,
        patientField: 'gender',
        options: [
          { value: 'male', label: 'Male' },
          { value: 'female', label: 'Female' },
        ],
      },
      { id: 'c_duration', prompt: 'Days?', type: 'numeric', isCompulsory: true, min: 0 },
      { id: 'c_severity', prompt: 'Severity?', type: 'numeric', isCompulsory: true, min: 0, max: 10 },
    ];

    const catalog = load(
      {
        primarySymptomQuestionId: 'c_complaint',
        baseSequence: [
          'c_age',
          ...optional.slice(0, 6),
          'c_complaint',
          ...optional.slice(6, 12),
          'c_gender',
          'c_duration',
          ...optional.slice(12),
          'c_severity',
        ],
        questions: [
          ...compulsory,
          ...optional.map((id) => ({ id, prompt: `${id}?`, type: 'free_text', isCompulsory: false })),
          { id: 'h_1', prompt: 'Where?', type: 'free_text', isCompulsory: true },
          { id: 'h_2', prompt: 'Since when?', type: 'free_text', isCompulsory: true },
          { id: 'h_3', prompt: 'Vision?', type: 'free_text', isCompulsory: false },
          {
            id: 'p_1',
            prompt: 'Pregnant?',
            type: 'free_text',
            isCompulsory: true,
            condition: { questionId: 'c_gender', equals: 'female' },
          },
          {
            id: 'p_2',
            prompt: 'Last period?',
            type: 'free_text',
            isCompulsory: false,
            condition: { questionId: 'c_gender', equals: 'female' },
          },
        ],
      },
      {
        symptoms: {
          headache: { label: 'Headache', keywords: ['headache'], followUpQuestions: ['h_1', 'h_2', 'h_3'] },
        },
      }
    );

    const profile = Object.fromEntries(optional.map((id) => [id, 'none']));
    const session = createSession(catalog, profile, NOW);

    expect(session.baseSequence).toEqual(compulsory.map((q) => q.id));
    expect(session.answers).toHaveLength(18);

    const { session: done, asked } = answerAll(catalog, session, {
      c_complaint: 'severe headache',
      c_gender: 'female',
    });

    expect(asked).toEqual(['c_age', 'c_complaint', 'c_gender', 'c_duration', 'c_severity', 'h_1', 'h_2', 'h_3', 'p_1', 'p_2']);
    expect(effectiveSequence(done)).toHaveLength(5 + 3 + 2);
    expect(done.status).toBe('completed');
    expect(done.answers).toHaveLength(18 + 10);
  });
});
