/**
 * Cross-checks observed track points against each header's declared count.
 *
 * Records are grouped by (basin, cyclone number, observation year, name), with the
 * year taken from the data line. A storm whose track crosses 31 December therefore
 * shows up as two groups that each miss their declared count but agree in aggregate;
 * those mismatches are reported as expected.
 */
import { EntryCountMismatchError } from '../core/errors.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import { formatStormIdentity, type CompositeRecord, type StormIdentity } from '../schemas/storm.js';

export interface EntryCountGroup {
  /** `year` is the observation year. */
  identity: StormIdentity;
  declaredEntries: number;
  observed: number;
  blocks: Map<number, number>; // blockIndex -> declared entries of that block
}

export interface EntryCountMismatch {
  identity: StormIdentity;
  declaredEntries: number;
  observed: number;
  /** True for a calendar-year split that balances across its groups. */
  expected: boolean;
}

export interface ValidationReport {
  groupCount: number;
  recordCount: number;
  mismatches: EntryCountMismatch[];
  expectedCount: number;
  unexpectedCount: number;
}

function observationYear(record: CompositeRecord): number {
  return /^\d{4}$/.test(record.year) ? parseInt(record.year, 10) : record.header.year;
}

function groupKey(identity: StormIdentity): string {
  return `${identity.basin}|${identity.cycloneNumber}|${identity.year}|${identity.name}`;
}

function familyKey(identity: StormIdentity): string {
  return `${identity.basin}|${identity.cycloneNumber}|${identity.name}`;
}

export function groupByIdentity(records: Iterable<CompositeRecord>): EntryCountGroup[] {
  const groups = new Map<string, EntryCountGroup>();

  for (const record of records) {
    const { basin, cycloneNumber, name, declaredEntries } = record.header;
    const identity = { basin, cycloneNumber, name, year: observationYear(record) };
    const key = groupKey(identity);

    let group = groups.get(key);
    if (!group) {
      group = { identity, declaredEntries: 0, observed: 0, blocks: new Map() };
      groups.set(key, group);
    }
    group.observed++;
    if (!group.blocks.has(record.blockIndex)) {
      group.blocks.set(record.blockIndex, declaredEntries);
      group.declaredEntries += declaredEntries;
    }
  }

  return [...groups.values()];
}

/**
 * Split mismatching groups of one storm family into runs of consecutive years.
 */
function consecutiveRuns(groups: EntryCountGroup[]): EntryCountGroup[][] {
  const sorted = [...groups].sort((a, b) => a.identity.year - b.identity.year);
  const runs: EntryCountGroup[][] = [];

  for (const group of sorted) {
    const run = runs[runs.length - 1];
    const last = run?.[run.length - 1];
    if (run && last && group.identity.year === last.identity.year + 1) {
      run.push(group);
    } else {
      runs.push([group]);
    }
  }
  return runs;
}

function isBalancedSplit(run: EntryCountGroup[]): boolean {
  if (run.length < 2) return false;

  const blocks = new Map<number, number>();
  let observed = 0;
  for (const group of run) {
    observed += group.observed;
    for (const [blockIndex, declared] of group.blocks) {
      blocks.set(blockIndex, declared);
    }
  }

  let declared = 0;
  for (const count of blocks.values()) declared += count;
  return observed === declared;
}

export function validateEntryCounts(
  records: Iterable<CompositeRecord>,
  logger: Logger = defaultLogger
): ValidationReport {
  const groups = groupByIdentity(records);
  const mismatched = groups.filter((g) => g.observed !== g.declaredEntries);

  const families = new Map<string, EntryCountGroup[]>();
  for (const group of mismatched) {
    const key = familyKey(group.identity);
    families.set(key, [...(families.get(key) ?? []), group]);
  }

  const expectedGroups = new Set<EntryCountGroup>();
  for (const family of families.values()) {
    for (const run of consecutiveRuns(family)) {
      if (isBalancedSplit(run)) {
        run.forEach((g) => expectedGroups.add(g));
      }
    }
  }

  // Keep source order
  const mismatches: EntryCountMismatch[] = mismatched.map((g) => ({
    identity: g.identity,
    declaredEntries: g.declaredEntries,
    observed: g.observed,
    expected: expectedGroups.has(g),
  }));

  for (const m of mismatches) {
    if (!m.expected) {
      logger.warn(
        `Entry count mismatch for ${formatStormIdentity(m.identity)}: declared ${m.declaredEntries}, found ${m.observed}`
      );
    }
  }

  const expectedCount = mismatches.filter((m) => m.expected).length;
  return {
    groupCount: groups.length,
    recordCount: groups.reduce((sum, g) => sum + g.observed, 0),
    mismatches,
    expectedCount,
    unexpectedCount: mismatches.length - expectedCount,
  };
}

/**
 * Opt-in strictness: mismatches are warnings unless the caller escalates them.
 */
export function assertNoUnexpectedMismatches(report: ValidationReport): void {
  const unexpected = report.mismatches.filter((m) => !m.expected);
  if (unexpected.length === 0) return;

  const detail = unexpected
    .map((m) => `${formatStormIdentity(m.identity)} declared ${m.declaredEntries}, found ${m.observed}`)
    .join('; ');
  throw new EntryCountMismatchError(unexpected.length, detail);
}
