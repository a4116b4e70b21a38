import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_DB_PATH = path.join(__dirname, '..', 'data', 'catalog.db');

export const DEFAULT_STOP_WORDS = [
    'the', 'and', 'feat', 'featuring', 'remastered', 'remaster', 'version', 'edit', 'live',
    'deluxe', 'edition', 'expanded',
];

/** Tuning knobs for scoring and matching. */
export interface MatchConfig {
    /** Minimum score for automatic (import-time) matching */
    strictThreshold: number;
    /** Minimum score for the interactive duplicate prompt; never above strictThreshold */
    looseThreshold: number;
    stopWords: ReadonlySet<string>;
    creatorExact: number;
    creatorPartial: number;
    titleExact: number;
    titlePartial: number;
    tokenBonus: number;
    shortCandidateRatio: number;
    shortCandidatePenalty: number;
}

export interface AppConfig {
    port: number;
    dbPath: string;
    match: MatchConfig;
}

export const DEFAULT_MATCH_CONFIG: MatchConfig = {
    strictThreshold: 140,
    looseThreshold: 100,
    stopWords: new Set(DEFAULT_STOP_WORDS),
    creatorExact: 90,
    creatorPartial: 50,
    titleExact: 90,
    titlePartial: 55,
    tokenBonus: 4,
    shortCandidateRatio: 0.6,
    shortCandidatePenalty: 60,
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new Error(`${name} must be a number, got "${raw}"`);
    }
    return value;
}

function readStopWords(env: NodeJS.ProcessEnv): ReadonlySet<string> {
    const raw = env.MATCH_STOP_WORDS;
    if (raw === undefined || raw.trim() === '') return DEFAULT_MATCH_CONFIG.stopWords;
    return new Set(raw.split(',').map((w) => w.trim().toLowerCase()).filter(Boolean));
}

/** Build match settings from the environment, falling back to the defaults. */
export function loadMatchConfig(env: NodeJS.ProcessEnv = process.env): MatchConfig {
    const match: MatchConfig = {
        ...DEFAULT_MATCH_CONFIG,
        strictThreshold: readNumber(env, 'MATCH_STRICT_THRESHOLD', DEFAULT_MATCH_CONFIG.strictThreshold),
        looseThreshold: readNumber(env, 'MATCH_LOOSE_THRESHOLD', DEFAULT_MATCH_CONFIG.looseThreshold),
        stopWords: readStopWords(env),
        shortCandidateRatio: readNumber(env, 'MATCH_SHORT_CANDIDATE_RATIO', DEFAULT_MATCH_CONFIG.shortCandidateRatio),
        shortCandidatePenalty: readNumber(env, 'MATCH_SHORT_CANDIDATE_PENALTY', DEFAULT_MATCH_CONFIG.shortCandidatePenalty),
    };

    if (match.looseThreshold > match.strictThreshold) {
        throw new Error(
            `MATCH_LOOSE_THRESHOLD (${match.looseThreshold}) must not exceed MATCH_STRICT_THRESHOLD (${match.strictThreshold})`
        );
    }
    if (match.shortCandidateRatio < 0 || match.shortCandidateRatio > 1) {
        throw new Error(`MATCH_SHORT_CANDIDATE_RATIO must be between 0 and 1, got ${match.shortCandidateRatio}`);
    }
    return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return {
        port: readNumber(env, 'PORT', 3000),
        dbPath: env.DB_PATH && env.DB_PATH.trim() !== '' ? env.DB_PATH : DEFAULT_DB_PATH,
        match: loadMatchConfig(env),
    };
}
