/**
 * services/query.ts — Query engine
 *
 * Builds the eligible-homeowner projection as an explicit pipeline of
 * transform stages over an in-memory snapshot. Stages are generators, so
 * nothing runs until the pipeline is iterated or collected.
 *
 * Eligibility: inactive !== true AND id is in the caller's filter list.
 */
import { DataIntegrityError, DataSourceError } from '../shared/errors.ts';
import type { HomeownerSource } from './dal.ts';
import type {
  Homeowner, EligibleHomeowner, EligibleSort, FetchContext,
} from '../types.ts';

export type Stage<I, O> = (input: Iterable<I>) => Iterable<O>;

/**
 * Lazy, one-pass pipeline. `collect()` is the only materialization point.
 */
export class Pipeline<T> implements Iterable<T> {
  private readonly source: Iterable<T>;

  constructor(source: Iterable<T>) {
    this.source = source;
  }

  static from<T>(source: Iterable<T>): Pipeline<T> {
    return new Pipeline(source);
  }

  pipe<O>(stage: Stage<T, O>): Pipeline<O> {
    return new Pipeline(stage(this.source));
  }

  [Symbol.iterator](): Iterator<T> {
    return this.source[Symbol.iterator]();
  }

  collect(): T[] {
    return Array.from(this.source);
  }
}

// ═══ STAGES ═══

/** Rejects a snapshot carrying the same homeowner id twice. */
export function assertUniqueIds(): Stage<Homeowner, Homeowner> {
  return function* (input) {
    const seen = new Set<number>();
    for (const h of input) {
      if (seen.has(h.id)) {
        throw new DataIntegrityError(`Duplicate homeowner id ${h.id} in source snapshot`);
      }
      seen.add(h.id);
      yield h;
    }
  };
}

export function excludeInactive(): Stage<Homeowner, Homeowner> {
  return function* (input) {
    for (const h of input) {
      if (h.inactive !== true) yield h;
    }
  };
}

/** Filter-list duplicates collapse into the set, so they never duplicate rows. */
export function restrictToFilter(filterIds: Iterable<number>): Stage<Homeowner, Homeowner> {
  const allowed = new Set(filterIds);
  return function* (input) {
    if (allowed.size === 0) return;
    for (const h of input) {
      if (allowed.has(h.id)) yield h;
    }
  };
}

export function toFullName(firstName: string, lastName: string): string {
  return `${firstName.trim()} ${lastName.trim()}`.trim().replace(/\s+/g, ' ');
}

export function projectHomeowner(h: Homeowner): EligibleHomeowner {
  return {
    id: h.id,
    firstName: h.firstName,
    lastName: h.lastName,
    fullName: toFullName(h.firstName, h.lastName),
    activeStatus: h.inactive === false ? 'active' : 'unknown',
  };
}

export function project(): Stage<Homeowner, EligibleHomeowner> {
  return function* (input) {
    for (const h of input) yield projectHomeowner(h);
  };
}

/** Sorting needs the whole set, so this stage buffers its input. */
export function sortBy(sort: EligibleSort): Stage<EligibleHomeowner, EligibleHomeowner> {
  const dir = sort.direction === 'desc' ? -1 : 1;
  return (input) => {
    const rows = Array.from(input);
    return rows.sort((a, b) => {
      const cmp = sort.field === 'id'
        ? a.id - b.id
        : a[sort.field].localeCompare(b[sort.field]) || a.id - b.id;
      return cmp * dir;
    });
  };
}

// ═══ ENGINE ═══

export interface EligibleQueryOpts {
  sort?: EligibleSort;
}

/**
 * Compose the eligibility pipeline over an already-fetched snapshot.
 * Nothing is evaluated until the result is iterated.
 */
export function buildEligiblePipeline(
  homeowners: Iterable<Homeowner>,
  filterIds: Iterable<number>,
  opts: EligibleQueryOpts = {},
): Pipeline<EligibleHomeowner> {
  const pipeline = Pipeline.from(homeowners)
    .pipe(assertUniqueIds())
    .pipe(excludeInactive())
    .pipe(restrictToFilter(filterIds))
    .pipe(project());
  return opts.sort ? pipeline.pipe(sortBy(opts.sort)) : pipeline;
}

/**
 * Fetch the homeowner snapshot and materialize the eligible projection.
 * A failed fetch surfaces as DataSourceError; there is no retry here.
 */
export async function selectEligibleHomeowners(
  source: HomeownerSource,
  filterIds: readonly number[],
  ctx: FetchContext,
  opts: EligibleQueryOpts = {},
): Promise<EligibleHomeowner[]> {
  if (filterIds.length === 0) return [];
  const homeowners = await fetchHomeowners(source, ctx);
  return buildEligiblePipeline(homeowners, filterIds, opts).collect();
}

export async function fetchHomeowners(source: HomeownerSource, ctx: FetchContext): Promise<readonly Homeowner[]> {
  try {
    return await source.fetchHomeowners(ctx);
  } catch (err) {
    if (err instanceof DataSourceError) throw err;
    throw new DataSourceError('homeowner', err);
  }
}
