/**
 * Keyword topic classifier
 */

import { loadLexicon, TopicLexiconSchema, type TopicLexicon } from './lexicons.js';
import { combineWeights, compileTerms, matchTerms, type CompiledTerm } from './terms.js';
import type { TopicClassifier, TopicQuery, TopicScore } from './types.js';

export interface KeywordTopicClassifierOptions {
  lexiconDir?: string;
  lexicon?: TopicLexicon;
}

/**
 * Scores each requested topic by the weighted keywords present in the text.
 * Keywords supplied with a query extend (and override) the lexicon's.
 */
export class KeywordTopicClassifier implements TopicClassifier {
  private readonly topics: Map<string, Record<string, number>>;
  private readonly compiled = new Map<string, CompiledTerm[]>();

  constructor(options: KeywordTopicClassifierOptions = {}) {
    const lexicon = options.lexicon ?? loadLexicon('topics', TopicLexiconSchema, options.lexiconDir);
    this.topics = new Map(Object.entries(lexicon.topics));
  }

  knows(topic: string): boolean {
    return this.topics.has(topic);
  }

  /**
   * Names of every topic in the lexicon
   */
  topicNames(): string[] {
    return Array.from(this.topics.keys());
  }

  classify(text: string, topics: TopicQuery[]): TopicScore[] {
    return topics.map((query) => {
      const terms = matchTerms(text, this.termsFor(query));
      return { topic: query.name, score: combineWeights(terms.map((t) => t.weight)), terms };
    });
  }

  private termsFor(query: TopicQuery): CompiledTerm[] {
    if (query.keywords) {
      return compileTerms({ ...this.topics.get(query.name), ...query.keywords });
    }

    let terms = this.compiled.get(query.name);
    if (!terms) {
      terms = compileTerms(this.topics.get(query.name) ?? {});
      this.compiled.set(query.name, terms);
    }
    return terms;
  }
}
