import type { CatalogSource, DecisionTreeSource } from '../domain/catalog/loader';
import { load } from '../domain/catalog/loader';
import type { CatalogHandle } from '../domain/catalog/catalog';

const yesNo = [
  { value: 'yes', label: 'Yes' },
  { value: 'no', label: 'No' },
];

/**
 * Small catalog for engine tests. The primary question comes before gender
 * so symptom follow-ups are queued before the conditionals.
 */
export function catalogSource(): CatalogSource {
  return {
    version: 'test',
    primarySymptomQuestionId: 'q_complaint',
    medicalHistoryQuestionId: 'q_history',
    baseSequence: ['q_name', 'q_age', 'q_complaint', 'q_gender', 'q_history'],
    questions: [
      { id: 'q_name', prompt: 'Your name?', type: 'free_text', isCompulsory: false, patientField: 'name' },
      {
        id: 'q_age',
        prompt: 'Your age?',
        type: 'single_choice',
        isCompulsory: true,
        patientField: 'age',
        options: [
          { value: '18_25', label: '18-25' },
          { value: '26_35', label: '26-35' },
        ],
      },
      { id: 'q_complaint', prompt: 'What is wrong?', type: 'free_text', isCompulsory: true },
      {
        id: 'q_gender',
        prompt: 'Your sex?',
        type: 'single_choice',
        isCompulsory: true,
        patientField: 'gender',
        options: [
          { value: 'male', label: 'Male' },
          { value: 'female', label: 'Female' },
        ],
      },
      { id: 'q_history', prompt: 'Medical history?', type: 'free_text', isCompulsory: false },
      {
        id: 'q_pregnant',
        prompt: 'Could you be pregnant?',
        type: 'single_choice',
        isCompulsory: true,
        options: yesNo,
        condition: { questionId: 'q_gender', equals: 'female' },
      },
      {
        id: 'q_last_period',
        prompt: 'When was your last period?',
        type: 'free_text',
        isCompulsory: false,
        condition: { questionId: 'q_gender', equals: 'female' },
      },
      { id: 'fu_location', prompt: 'Where does it hurt?', type: 'free_text', isCompulsory: true, symptomTags: ['headache'] },
      { id: 'fu_onset', prompt: 'Sudden onset?', type: 'single_choice', isCompulsory: true, options: yesNo, symptomTags: ['headache'] },
      { id: 'fu_temperature', prompt: 'Temperature?', type: 'numeric', isCompulsory: false, min: 34, max: 43, symptomTags: ['fever', 'chills'] },
      { id: 'fu_fever_days', prompt: 'Days with fever?', type: 'numeric', isCompulsory: true, min: 0, symptomTags: ['fever'] },
      { id: 'fu_shivering', prompt: 'Shivering?', type: 'single_choice', isCompulsory: true, options: yesNo, symptomTags: ['chills'] },
    ],
  };
}

export function decisionTreeSource(): DecisionTreeSource {
  return {
    emergencyKeywords: ['cannot breathe', 'seizure'],
    disclaimer: 'Not a diagnosis.',
    symptoms: {
      headache: {
        label: 'Headache',
        keywords: ['headache', 'migraine'],
        followUpQuestions: ['fu_location', 'fu_onset'],
        defaultUrgency: 'green_home_care',
        redFlags: ['Worst headache ever'],
        analysisHints: 'Check for tension headache.',
        suggestedAdvice: 'Rest in a dark room.',
      },
      fever: {
        label: 'Fever',
        keywords: ['fever', 'temperature'],
        followUpQuestions: ['fu_temperature', 'fu_fever_days'],
        defaultUrgency: 'yellow_doctor_visit',
        redFlags: ['Fever above 39.5'],
        analysisHints: 'Look for infection.',
        suggestedAdvice: 'Stay hydrated.',
      },
      chills: {
        label: 'Chills',
        keywords: ['chills'],
        followUpQuestions: ['fu_temperature', 'fu_shivering'],
        redFlags: ['Fever above 39.5', 'Rigors'],
        suggestedAdvice: 'Stay hydrated.',
      },
    },
  };
}

export function fixtureCatalog(): CatalogHandle {
  return load(catalogSource(), decisionTreeSource());
}
