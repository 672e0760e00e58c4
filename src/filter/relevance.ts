import type {
    EntityCandidate,
    FilterConfig,
    FilterDecision,
    MembershipSet,
    TopicScore,
} from '../types/index.js';
import { bareId } from '../sources/utils.js';
import type { CountOracle } from './count-oracle.js';

/**
 * The part of the count oracle the filter depends on.
 */
export type ShareOracle = Pick<CountOracle, 'shareInField'>;

/**
 * Sort topics by score, highest first. Ties keep their original order.
 * Returns a new array.
 */
export function sortTopics(topics: readonly TopicScore[]): TopicScore[] {
    return [...topics].sort((a, b) => b.score - a.score);
}

/**
 * Decides whether an author belongs to the field.
 *
 * Gates, in order, stopping at the first failure:
 * 1. a field concept among the top-K topics (when topK > 0);
 * 2. a field concept scoring at least `minAbsoluteScore` (the best one wins);
 * 3. that concept reaching `relativeThreshold` × the top topic's score;
 * 4. below `borderlineThreshold`, enough of the author's works in the field,
 *    unless the top topic is itself in the field and the skip flag is set.
 *
 * Only gate 4 touches the network, through the count oracle.
 */
export class RelevanceFilter {
    private readonly rootId: string;

    constructor(
        private readonly config: FilterConfig,
        rootId: string,
        private readonly oracle: ShareOracle
    ) {
        this.rootId = bareId(rootId);
    }

    async evaluate(candidate: EntityCandidate, membership: MembershipSet): Promise<FilterDecision> {
        if (candidate.topics.length === 0) {
            return { accepted: false, reason: 'no-topics' };
        }

        const ranked = sortTopics(candidate.topics);
        const top = ranked[0];
        if (!top) {
            return { accepted: false, reason: 'no-topics' };
        }

        const { topK, minAbsoluteScore, relativeThreshold, borderlineThreshold } = this.config;

        if (topK > 0 && !ranked.slice(0, topK).some((topic) => membership.has(topic.id))) {
            return { accepted: false, reason: 'outside-top-k' };
        }

        // ranked is score-descending, so the first qualifying topic is the best one
        const bestInField = ranked.find(
            (topic) => membership.has(topic.id) && topic.score >= minAbsoluteScore
        );
        if (!bestInField) {
            return { accepted: false, reason: 'below-absolute-floor' };
        }

        if (relativeThreshold !== null && bestInField.score < relativeThreshold * (top.score || 0)) {
            return { accepted: false, reason: 'below-relative-strength' };
        }

        const isPrimaryInField = membership.has(top.id);

        if (bestInField.score < borderlineThreshold) {
            const trustScore = this.config.skipShareIfTopInField && isPrimaryInField;
            if (!trustScore) {
                const enough = await this.oracle.shareInField(candidate.id, this.rootId, this.config.minShare);
                if (!enough) {
                    return { accepted: false, reason: 'insufficient-field-share' };
                }
            }
        }

        return {
            accepted: true,
            topPrimary: top,
            bestInField,
            bestInFieldScore: bestInField.score,
            isPrimaryInField,
        };
    }
}
