import { createLogger, type Logger } from '../logger';
import { BLANK, type Variant } from '../core/types';
import { normalize, type Lexicon } from './dictionaryService';

export type JudgeReason = 'in_dictionary' | 'not_in_dictionary' | 'too_short' | 'unresolved_blank';

export interface WordVerdict {
  word: string;
  valid: boolean;
  reason: JudgeReason;
}

export interface JudgeVerdict {
  results: WordVerdict[];
  /** False for an empty word list. */
  allValid: boolean;
}

/** Word legality oracle, independent of board geometry. */
export interface DictionaryJudge {
  judge(words: readonly string[], language: Variant): Promise<JudgeVerdict>;
}

export class LexiconJudge implements DictionaryJudge {
  private readonly lexicons: Partial<Record<Variant, Lexicon>>;
  private readonly logger: Logger;

  constructor(lexicons: Partial<Record<Variant, Lexicon>>, logger: Logger = createLogger('judge')) {
    this.lexicons = lexicons;
    this.logger = logger;
  }

  judgeWord(word: string, language: Variant): WordVerdict {
    const norm = normalize(word);
    const lexicon = this.lexicons[language];
    if (norm.includes(BLANK)) return { word: norm, valid: false, reason: 'unresolved_blank' };
    if (!lexicon) return { word: norm, valid: false, reason: 'not_in_dictionary' };
    if (norm.length < lexicon.minLength) return { word: norm, valid: false, reason: 'too_short' };
    if (lexicon.has(norm)) return { word: norm, valid: true, reason: 'in_dictionary' };
    return { word: norm, valid: false, reason: 'not_in_dictionary' };
  }

  async judge(words: readonly string[], language: Variant): Promise<JudgeVerdict> {
    if (!this.lexicons[language]) {
      this.logger.warn(`No lexicon loaded for ${language}; rejecting ${words.length} word(s)`);
    }
    const results = words.map((word) => this.judgeWord(word, language));
    return { results, allValid: results.length > 0 && results.every((r) => r.valid) };
  }
}
