import type { Question, SymptomDefinition, SymptomMatch } from '../../shared/types';
import { findKeywordHits } from '../../shared/matching';
import type { KeywordEntry } from '../../shared/matching';
import { normalizeText } from '../../shared/validation';

/**
 * Lookup from detected symptom keyword to its ordered follow-up questions.
 * Built once from validated catalog data and never mutated.
 */
export class DecisionTreeIndex {
  private readonly symptoms: ReadonlyMap<string, SymptomDefinition>;
  private readonly keywordToSymptom: ReadonlyMap<string, string>;
  private readonly entries: KeywordEntry[];

  constructor(
    symptoms: SymptomDefinition[],
    private readonly questions: ReadonlyMap<string, Question>
  ) {
    const bySymptom = new Map<string, SymptomDefinition>();
    const byKeyword = new Map<string, string>();

    for (const symptom of symptoms) {
      bySymptom.set(symptom.name, symptom);
      for (const keyword of symptom.keywords) {
        byKeyword.set(normalizeText(keyword), symptom.name);
      }
    }

    this.symptoms = bySymptom;
    this.keywordToSymptom = byKeyword;
    this.entries = symptoms.map((s) => ({ key: s.name, keywords: s.keywords }));
  }

  /**
   * Symptoms mentioned in free text, in the order they first appear.
   */
  match(text: string): SymptomMatch[] {
    return findKeywordHits(text, this.entries).map((hit) => ({
      symptom: hit.key,
      keyword: hit.keyword,
      position: hit.position,
    }));
  }

  /**
   * Follow-ups for a symptom, addressed by symptom name or by any of its
   * keywords. Unknown keys give an empty list.
   */
  followUpsFor(symptomOrKeyword: string): Question[] {
    const symptom = this.resolve(symptomOrKeyword);
    if (!symptom) return [];

    const followUps: Question[] = [];
    for (const id of symptom.followUpQuestions) {
      const question = this.questions.get(id);
      if (question) followUps.push(question);
    }
    return followUps;
  }

  symptom(name: string): SymptomDefinition | undefined {
    return this.symptoms.get(name);
  }

  allSymptoms(): SymptomDefinition[] {
    return Array.from(this.symptoms.values());
  }

  get keywordCount(): number {
    return this.keywordToSymptom.size;
  }

  private resolve(symptomOrKeyword: string): SymptomDefinition | undefined {
    const direct = this.symptoms.get(symptomOrKeyword);
    if (direct) return direct;

    const name = this.keywordToSymptom.get(normalizeText(symptomOrKeyword));
    return name ? this.symptoms.get(name) : undefined;
  }
}
