import { ChunkMatch, VectorStore, compareMatches } from '../../domain/entities/VectorStore';
import { RetrievalResult, similarity } from '../../domain/entities/RetrievalResult';
import { DateRange, isWithinRange } from '../utils/dateRange';
import { EmbeddingService } from './EmbeddingService';

export interface RetrievalConfig {
    defaultK: number;
    maxK: number;
    /** Blend keyword relevance into the ranking unless a request says otherwise. */
    hybrid?: boolean;
    /** Weight of vector similarity in the hybrid blend. */
    alpha?: number;
    /** Candidates fetched per requested result when blending or filtering. */
    candidateMultiplier?: number;
}

export interface RetrievalOptions {
    hybrid?: boolean;
    alpha?: number;
    dateRange?: DateRange;
}

export interface RetrievalMode {
    hybrid: boolean;
    alpha: number;
}

interface ScoredMatch {
    match: ChunkMatch;
    score: number;
}

const DEFAULT_ALPHA = 0.6;
const DEFAULT_CANDIDATE_MULTIPLIER = 3;

const compareScored = (a: ScoredMatch, b: ScoredMatch): number =>
    b.score - a.score || compareMatches(a.match, b.match);

export class RetrievalService {
    constructor(
        private embeddings: EmbeddingService,
        private store: VectorStore,
        private config: RetrievalConfig
    ) {}

    /**
     * Clamps k to [1, maxK]. Missing or non-finite values fall back to the default.
     */
    clampK(k?: number): number {
        const requested = k !== undefined && Number.isFinite(k) ? Math.trunc(k) : this.config.defaultK;
        return Math.min(this.config.maxK, Math.max(1, requested));
    }

    /**
     * Request overrides over the configured defaults, alpha clamped to [0, 1].
     */
    mode(options: RetrievalOptions = {}): RetrievalMode {
        const alpha = options.alpha ?? this.config.alpha ?? DEFAULT_ALPHA;
        return {
            hybrid: options.hybrid ?? this.config.hybrid ?? false,
            alpha: Math.min(1, Math.max(0, alpha)),
        };
    }

    /**
     * Embeds the query and returns the best chunks, best first. Vector-only
     * retrieval ranks by cosine distance; hybrid retrieval ranks by
     * `alpha * similarity + (1 - alpha) * keyword score` over the union of
     * both candidate sets. A date range drops chunks recorded outside it.
     * Provider and store errors are passed through unchanged.
     */
    async retrieve(query: string, k?: number, options: RetrievalOptions = {}): Promise<RetrievalResult[]> {
        const limit = this.clampK(k);
        const { hybrid, alpha } = this.mode(options);
        const { dateRange } = options;
        const candidates = hybrid || dateRange
            ? limit * (this.config.candidateMultiplier ?? DEFAULT_CANDIDATE_MULTIPLIER)
            : limit;

        const queryVector = await this.embeddings.embedQuery(query);
        const scored = hybrid
            ? await this.blend(query, queryVector, candidates, alpha)
            : (await this.store.topK(queryVector, candidates)).map(match => ({ match, score: similarity(match.distance) }));

        return scored
            .filter(({ match }) => dateRange === undefined || isWithinRange(match.metadata, dateRange))
            .slice(0, limit)
            .map(({ match, score }) => new RetrievalResult(
                match.chunkId,
                match.documentId,
                match.ordinal,
                match.content,
                match.metadata,
                match.distance,
                score
            ));
    }

    private async blend(query: string, queryVector: number[], candidates: number, alpha: number): Promise<ScoredMatch[]> {
        const [nearest, keyword] = await Promise.all([
            this.store.topK(queryVector, candidates),
            this.store.textSearch(query, queryVector, candidates),
        ]);

        const textScores = new Map(keyword.map(match => [match.chunkId, match.textScore]));
        const pool = new Map<string, ChunkMatch>();
        for (const match of [...nearest, ...keyword]) {
            if (!pool.has(match.chunkId)) pool.set(match.chunkId, match);
        }

        return [...pool.values()]
            .map(match => ({
                match,
                score: alpha * similarity(match.distance) + (1 - alpha) * (textScores.get(match.chunkId) ?? 0),
            }))
            .sort(compareScored);
    }
}
