/**
 * Import pipeline: bytes -> decode -> split -> detect -> map -> dedup ->
 * categorize -> validate -> canonical rows plus batch audit record.
 *
 * Synchronous and side-effect free. Persisting rows and the batch is the
 * caller's job.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Row errors and rule warnings are
 * returned on the batch.
 */

import type { CanonicalRow, CategorizationFields, ImportBatch, ProfileId, RowIssue } from '../types/index.js';
import { ImportAbortedError, FormatUnrecognizedError, RowError } from '../errors.js';
import { decodeStatement, isBlankRow, splitCsv } from '../utils/csv.js';
import { hashContent, generateBatchId } from '../utils/hash.js';
import { detectFormat } from '../parser/detect.js';
import { buildColumnPlan, mapRow } from '../parser/map-row.js';
import type { MappedRow } from '../parser/map-row.js';
import { getSupportedProfiles } from '../parser/profiles.js';
import { DedupIndex } from '../dedup/index.js';
import { buildRuleTiers, categorizeWithTiers } from '../categorizer/categorize.js';
import { validateTribeSplit } from '../validation/validate.js';
import type { ImportInput, ImportOutput } from './types.js';

/**
 * Categorization state of a freshly imported row before rules run.
 */
export const UNCATEGORIZED: CategorizationFields = {
    direction: null,
    ownership: null,
    tax: false,
    cost_type: '',
    cost_detail: '',
    tribe: null,
    split_mh: '0',
    split_sk: '0',
    split_xp: '0',
    split_fr: '0',
    project_id: null,
    product_id: null,
    subgroup_id: null,
    status: 'imported',
};

interface BatchProgress {
    format: ProfileId | null;
    encoding: string | null;
    total_rows: number;
    imported: number;
    skipped: number;
    error_details: RowIssue[];
    warning_details: RowIssue[];
}

/**
 * Import one CSV file.
 *
 * Row-level problems (malformed values, missing required fields, invalid
 * tribe split) are recorded on the batch and the row is skipped.
 * Duplicates by natural key are counted as skipped.
 *
 * @throws ImportAbortedError (DecodeFailureError | FormatUnrecognizedError)
 *         carrying a finalized batch with status 'failed'
 */
export function runImport(input: ImportInput): ImportOutput {
    const now = input.now ?? (() => new Date());
    const started = now();
    const startedAt = started.toISOString();
    const fileHash = hashContent(input.data);
    const batchId = generateBatchId(fileHash, input.filename, startedAt);

    const progress: BatchProgress = {
        format: null,
        encoding: null,
        total_rows: 0,
        imported: 0,
        skipped: 0,
        error_details: [],
        warning_details: [],
    };

    function finalize(status: ImportBatch['status'], failure: string | null): ImportBatch {
        const completed = now();
        return {
            id: batchId,
            filename: input.filename,
            file_hash: fileHash,
            format: progress.format,
            encoding: progress.encoding,
            status,
            total_rows: progress.total_rows,
            imported: progress.imported,
            skipped: progress.skipped,
            errors: progress.error_details.length,
            error_details: progress.error_details,
            warning_details: progress.warning_details,
            failure,
            started_at: startedAt,
            completed_at: completed.toISOString(),
            duration_ms: Math.max(0, completed.getTime() - started.getTime()),
            created_by: input.actor ?? null,
        };
    }

    try {
        const rows = importRows(input, batchId, progress);
        return { batch: finalize('completed', null), rows };
    } catch (e) {
        if (e instanceof ImportAbortedError) {
            e.batch = finalize('failed', e.message);
        }
        throw e;
    }
}

function importRows(input: ImportInput, batchId: string, progress: BatchProgress): CanonicalRow[] {
    const decoded = decodeStatement(input.data);
    progress.encoding = decoded.encoding;

    const records = splitCsv(decoded.text);
    const firstRow = records.findIndex((cells) => !isBlankRow(cells));
    const detection =
        firstRow === -1 ? null : detectFormat(records[firstRow], records.slice(firstRow + 1));

    if (!detection) {
        const supported = getSupportedProfiles().join(', ');
        throw new FormatUnrecognizedError(`Unrecognized CSV format. Supported formats: ${supported}`);
    }

    const { profile } = detection;
    progress.format = profile.id;

    const headerIndex = firstRow + detection.headerRowIndex;
    const plan = buildColumnPlan(profile, records[headerIndex]);
    const dataRows = records.slice(headerIndex + 1).filter((cells) => !isBlankRow(cells));
    progress.total_rows = dataRows.length;

    const dedup = new DedupIndex(input.existingKeys);
    const tiers = buildRuleTiers(input.rules ?? []);
    const accepted: CanonicalRow[] = [];

    dataRows.forEach((cells, index) => {
        const rowNumber = index + 1;

        const recordError = (code: RowIssue['code'], message: string): void => {
            progress.error_details.push({ row_number: rowNumber, code, message });
        };

        let mapped: MappedRow;
        try {
            mapped = mapRow(profile, plan, cells);
        } catch (e) {
            if (e instanceof RowError) {
                recordError(e.code, e.message);
                return;
            }
            throw e;
        }

        if (dedup.seen(mapped.naturalKey)) {
            progress.skipped++;
            return;
        }

        const { assignments, warnings } = categorizeWithTiers({ ...mapped.fields, direction: null }, tiers);
        for (const message of warnings) {
            progress.warning_details.push({ row_number: rowNumber, code: 'InvalidRulePattern', message });
        }

        const row: CanonicalRow = {
            ...mapped.fields,
            ...UNCATEGORIZED,
            ...assignments,
            source_file: input.filename,
            import_batch_id: batchId,
            row_number: rowNumber,
        };

        const split = validateTribeSplit(row);
        if (!split.valid) {
            recordError('InvalidTribeSplit', split.errors.join('; '));
            return;
        }

        accepted.push(row);
        dedup.remember(mapped.naturalKey);
        progress.imported++;
    });

    return accepted;
}
