import type { ClassificationRules } from '../../config/settings';
import type { ClassificationResult, RawActivitySample } from '../../types';
import type { ActivityLabeler } from './labeler';
import { composeDetails, matchAppRule } from './rules';

export interface ActivityClassifier {
  classify(sample: RawActivitySample, options?: { signal?: AbortSignal }): Promise<ClassificationResult>;
}

export interface ClassifierDependencies {
  rules: ClassificationRules;
  labeler: ActivityLabeler;
}

const IDLE: ClassificationResult = { category: 'Idle', details: null };
const PRIVATE: ClassificationResult = { category: 'Private', details: null };

function work(sample: RawActivitySample): ClassificationResult {
  const details = composeDetails(sample.app, sample.title);
  // Work always has a matched app or a title, so details cannot be empty here
  return { category: 'Work', details: details ?? 'Unknown' };
}

/**
 * Classify a single activity sample.
 *
 * Rules are checked in order: idle state, work apps, private apps, then
 * browsers. Only a browser sample with a window title reaches the AI labeler,
 * and only a Work label keeps the app and title as details.
 */
export function createActivityClassifier({ rules, labeler }: ClassifierDependencies): ActivityClassifier {
  return {
    async classify(sample, options) {
      if (sample.state === 'idle') {
        return IDLE;
      }

      switch (matchAppRule(sample.app, rules)) {
        case 'work':
          return work(sample);

        case 'private':
          return PRIVATE;

        case 'browser': {
          const title = sample.title?.trim();
          if (!title) {
            return PRIVATE;
          }

          const label = await labeler.label(sample.app?.trim() ?? '', title, { signal: options?.signal });
          return label === 'Work' ? work(sample) : PRIVATE;
        }

        default:
          return PRIVATE;
      }
    },
  };
}

export { createAiLabeler, createLabelerFromConfig, createOfflineLabeler, parseLabel } from './labeler';
export type { ActivityLabeler } from './labeler';
export { composeDetails, matchAppRule, normalizeAppName } from './rules';
