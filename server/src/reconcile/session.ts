import type { MatchConfig } from '../config.js';
import type { CatalogRepository } from '../db/db.js';
import { sourceKeyOf } from '../db/db.js';
import { ImportAbortedError, StorageUnavailableError, ValidationError, errorMessage } from '../errors.js';
import { parseIncomingRecord, rawTitleOf } from '../records.js';
import type { Category, ImportReport, IncomingRecord, Source } from '../types.js';
import type { CandidateIndex } from './candidates.js';
import { Matcher } from './matcher.js';
import { Merger, type MergeOutcome } from './merger.js';
import { fingerprint } from './normalize.js';
import { systemRuntime, type Runtime } from './runtime.js';
import { Wishlist } from './wishlist.js';

export interface RunOptions {
    /** Applied to records that do not name their own source */
    source?: Source;
}

/** Fill category/source on plain-object records that leave them out. */
function withDefaults(raw: unknown, category: Category, source: Source | undefined): unknown {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
    return source ? { category, source, ...raw } : { category, ...raw };
}

/**
 * Import Session: runs a batch of incoming records through matching and merging.
 *
 * Records are reconciled strictly in order, each in its own transaction, so a
 * record always sees what the records before it wrote (two rows for the same
 * album in one file end up as one item). A bad record is skipped, a failed write
 * is reported, and only a store that is gone altogether stops the run.
 * The category's candidates are read once per run and kept current in memory.
 */
export class ImportSession {
    private readonly matcher: Matcher;
    private readonly merger: Merger;
    private readonly wishlist: Wishlist;

    constructor(
        private readonly repo: CatalogRepository,
        config: MatchConfig,
        private readonly runtime: Runtime = systemRuntime
    ) {
        this.matcher = new Matcher(repo, config);
        this.merger = new Merger(repo);
        this.wishlist = new Wishlist(repo, runtime);
    }

    run(category: Category, records: Iterable<unknown>, options: RunOptions = {}): ImportReport {
        const report: ImportReport = {
            category,
            source: options.source ?? null,
            created: 0,
            updated: 0,
            unchanged: 0,
            skipped: 0,
            failed: 0,
            skippedRecords: [],
            failures: [],
            pruned: [],
        };

        let candidates: CandidateIndex;
        try {
            candidates = this.matcher.load(category);
        } catch (err) {
            if (err instanceof StorageUnavailableError) {
                throw new ImportAbortedError(`Import aborted: ${err.message}`, report, { cause: err });
            }
            throw err;
        }

        let index = -1;
        for (const raw of records) {
            index++;

            let record: IncomingRecord;
            try {
                record = parseIncomingRecord(withDefaults(raw, category, options.source));
            } catch (err) {
                if (!(err instanceof ValidationError)) throw err;
                report.skipped++;
                report.skippedRecords.push({ index, title: rawTitleOf(raw), reason: err.message });
                continue;
            }

            if (record.category !== category) {
                report.skipped++;
                report.skippedRecords.push({
                    index,
                    title: record.title,
                    reason: `category ${record.category} does not match import category ${category}`,
                });
                continue;
            }

            try {
                const outcome = this.repo.transaction(() => this.reconcile(record, candidates));
                report[outcome.action]++;
            } catch (err) {
                if (err instanceof StorageUnavailableError) {
                    console.error(`[import] aborting at record ${index} ("${record.title}"): ${err.message}`);
                    throw new ImportAbortedError(`Import aborted: ${err.message}`, report, { cause: err });
                }
                report.failed++;
                report.failures.push({ index, title: record.title, message: errorMessage(err) });
                console.error(`[import] failed to import "${record.title}":`, errorMessage(err));
            }
        }

        try {
            report.pruned = this.wishlist.prune(category);
        } catch (err) {
            if (err instanceof StorageUnavailableError) {
                throw new ImportAbortedError(`Import aborted during wishlist prune: ${err.message}`, report, { cause: err });
            }
            report.failures.push({ index: -1, title: '(wishlist prune)', message: errorMessage(err) });
            console.error('[import] wishlist prune failed:', errorMessage(err));
        }

        console.log(
            `[import] ${category}${report.source ? ` from ${report.source}` : ''}: ` +
            `${report.created} created, ${report.updated} updated, ${report.unchanged} unchanged, ` +
            `${report.skipped} skipped, ${report.failed} failed`
        );
        return report;
    }

    /**
     * Reconcile one validated record: reuse the item this exact source record is
     * already linked to, else look for a strict match, then merge. A written item
     * is refreshed in the index so the next record sees it.
     */
    reconcile(record: IncomingRecord, candidates: CandidateIndex): MergeOutcome {
        const key = sourceKeyOf({
            sourceExternalId: record.sourceExternalId,
            fingerprint: fingerprint(record.title, record.creator),
        });
        const linkedId = this.repo.findItemIdBySourceKey(record.category, record.source, key);
        let existing = linkedId ? this.repo.getItem(linkedId) : null;

        if (!existing) {
            existing = this.matcher.findMatch(record.category, record.title, record.creator, 'strict', candidates)?.item ?? null;
        }

        const outcome = this.merger.merge(existing, record, {
            now: this.runtime.now(),
            newId: this.runtime.newId,
            origin: 'import',
        });
        if (outcome.action !== 'unchanged') {
            const written = this.repo.getCandidate(outcome.itemId);
            if (written) candidates.put(written);
        }
        return outcome;
    }
}
