/**
 * BanTopics Scanner
 * Rejects prompts about banned topics
 */

import { ConfigurationError } from '../../config/errors.js';
import type { BanTopicsConfig, BannedTopic } from '../../config/schema.js';
import type { TopicClassifier, TopicQuery } from '../../detectors/types.js';
import { clampScore, SCANNER_NAMES, type ScanDirection, type Scanner, type ScannerMode, type ScannerOutput } from '../types.js';

interface ResolvedTopic extends TopicQuery {
  threshold: number;
}

function resolveTopic(topic: BannedTopic, defaultThreshold: number): ResolvedTopic {
  if (typeof topic === 'string') {
    return { name: topic, threshold: defaultThreshold };
  }
  return { name: topic.name, threshold: topic.threshold ?? defaultThreshold, keywords: topic.keywords };
}

export class BanTopicsScanner implements Scanner {
  readonly name = SCANNER_NAMES.banTopics;
  readonly directions: readonly ScanDirection[] = ['inbound'];
  readonly mode: ScannerMode;
  private readonly topics: ResolvedTopic[];

  /**
   * @throws ConfigurationError for a topic the classifier cannot score
   */
  constructor(
    config: Pick<BanTopicsConfig, 'topics' | 'threshold' | 'mode'>,
    private readonly classifier: TopicClassifier
  ) {
    this.mode = config.mode;
    this.topics = config.topics.map((topic) => resolveTopic(topic, config.threshold));

    for (const topic of this.topics) {
      const hasKeywords = Object.keys(topic.keywords ?? {}).length > 0;
      if (!hasKeywords && !classifier.knows(topic.name)) {
        throw new ConfigurationError(`Unknown banned topic "${topic.name}": give it keywords or use a known topic`);
      }
    }
  }

  async scan(text: string): Promise<ScannerOutput> {
    if (this.topics.length === 0) {
      return { text, valid: true, score: 0, details: { topics: [], triggered: [] } };
    }

    const scores = await this.classifier.classify(text, this.topics);
    const triggered: string[] = [];
    let score = 0;

    for (const result of scores) {
      const topicScore = clampScore(result.score);
      const topic = this.topics.find((t) => t.name === result.topic);
      if (topic && topicScore >= topic.threshold) {
        triggered.push(result.topic);
      }
      score = Math.max(score, topicScore);
    }

    return {
      text,
      valid: triggered.length === 0,
      score,
      details: {
        topics: scores.map((s) => ({ topic: s.topic, score: s.score, terms: s.terms.map((t) => t.term) })),
        triggered,
      },
    };
  }
}
