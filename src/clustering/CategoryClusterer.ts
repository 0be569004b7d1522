import { KeywordExtractor } from './KeywordExtractor.js';
import { cosineDistance, foldInto, foldOut, mean, weightedMean } from '../utils/vector.js';
import { ulid } from '../utils/ulid.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type {
  CategoryCentroid,
  CategoryClusterReport,
  CategoryId,
  ClusterMember,
  ReflectionId,
  Vector,
} from '../types/Reflection.js';

export interface CategoryClustererOptions {
  assignmentThreshold: number;
  parentThreshold: number;
  mergeThreshold: number;
  splitThreshold: number;
  minSplitMembers: number;
  decayWindowMs: number;
  now?: () => number;
  idFactory?: () => CategoryId;
  keywords?: KeywordExtractor;
  logger?: Logger;
}

export interface CategoryState {
  version: 1;
  categories: CategoryCentroid[];
}

type Snapshot = ReadonlyMap<CategoryId, Readonly<CategoryCentroid>>;

export interface Assignment {
  categoryId: CategoryId;
  created: boolean;
}

interface PendingAssignment extends Assignment {
  generation: number;
}

interface Growth {
  memberId: ReflectionId | null;
  categoryId: CategoryId;
}

interface Nearest {
  category: Readonly<CategoryCentroid>;
  distance: number;
}

const KMEANS_ROUNDS = 10;

/**
 * Evolving topic centroids.
 *
 * Readers always see one immutable snapshot. `assign` publishes a new map with
 * a single replaced entry; `recluster` builds its result on a private copy and
 * publishes it in one swap once the whole batch is done.
 */
export class CategoryClusterer {
  private readonly opts: Required<Omit<CategoryClustererOptions, 'logger' | 'keywords' | 'now' | 'idFactory'>>;
  private readonly now: () => number;
  private readonly newId: () => CategoryId;
  private readonly keywords: KeywordExtractor;
  private readonly log: Logger;
  private snapshot: Snapshot = new Map();
  // Bumped whenever a recluster or import replaces the snapshot wholesale
  private generation = 0;
  // Assignments whose reflection is not persisted yet
  private readonly pending = new Map<ReflectionId, PendingAssignment>();
  // Assignments made while a recluster is loading members
  private growth: Growth[] | null = null;
  // Merged categories point at their survivor, removed ones at null
  private readonly retired = new Map<CategoryId, CategoryId | null>();
  private running: Promise<CategoryClusterReport> | null = null;

  constructor(opts: CategoryClustererOptions) {
    this.opts = {
      assignmentThreshold: opts.assignmentThreshold,
      parentThreshold: opts.parentThreshold,
      mergeThreshold: opts.mergeThreshold,
      splitThreshold: opts.splitThreshold,
      minSplitMembers: opts.minSplitMembers,
      decayWindowMs: opts.decayWindowMs,
    };
    this.now = opts.now ?? Date.now;
    this.newId = opts.idFactory ?? (() => `cat_${ulid()}`);
    this.keywords = opts.keywords ?? new KeywordExtractor();
    this.log = opts.logger ?? createLogger('clusterer');
  }

  get size(): number {
    return this.snapshot.size;
  }

  get reclustering(): boolean {
    return this.running !== null;
  }

  get(categoryId: CategoryId): CategoryCentroid | undefined {
    const c = this.snapshot.get(categoryId);
    return c ? cloneCategory(c) : undefined;
  }

  list(): CategoryCentroid[] {
    return Array.from(this.snapshot.values(), cloneCategory);
  }

  /**
   * Category for a new reflection. Joins the nearest centroid within the
   * assignment threshold; otherwise opens a new leaf under the nearest
   * centroid within the parent threshold, or at the root.
   */
  assign(embedding: Vector | null, content = ''): CategoryId {
    return this.assignDetailed(embedding, content).categoryId;
  }

  /**
   * Same as `assign`, also telling whether a new category was opened. With a
   * `memberId` the assignment stays pending until `settle` or `unassign`, and
   * a recluster running meanwhile counts it even if the record is not loaded.
   */
  assignDetailed(embedding: Vector | null, content = '', memberId?: ReflectionId): Assignment {
    const now = this.now();
    const next = new Map(this.snapshot);
    const hit = embedding ? this.nearestIn(this.snapshot, embedding) : null;

    if (embedding && hit && hit.distance <= this.opts.assignmentThreshold) {
      const current = hit.category;
      const count = current.memberCount;
      next.set(current.categoryId, {
        ...cloneCategory(current),
        centroid: current.centroid ? foldInto(current.centroid, embedding, count) : embedding.slice(),
        memberCount: count + 1,
        lastGrewAt: now,
        decayed: false,
      });
      this.snapshot = next;
      return this.track({ categoryId: current.categoryId, created: false }, memberId);
    }

    const categoryId = this.newId();
    next.set(categoryId, {
      categoryId,
      parentId: hit && hit.distance <= this.opts.parentThreshold ? hit.category.categoryId : null,
      centroid: embedding ? embedding.slice() : null,
      memberCount: 1,
      keywords: content ? this.keywords.extract(content) : [],
      createdAt: now,
      lastGrewAt: now,
      lastReclusteredAt: null,
      decayed: false,
    });
    this.snapshot = next;
    this.log.debug('Created category', { categoryId, embedded: embedding !== null });
    return this.track({ categoryId, created: true }, memberId);
  }

  /** The reflection behind a pending assignment is stored. */
  settle(memberId: ReflectionId): void {
    this.pending.delete(memberId);
  }

  /**
   * Takes back a pending assignment whose reflection was never stored. A
   * category it opened goes away if nothing else joined it; otherwise the
   * count drops and, while no recluster has replaced the centroid since, the
   * embedding is folded back out of it.
   */
  unassign(memberId: ReflectionId, embedding: Vector | null): void {
    const assignment = this.pending.get(memberId);
    if (!assignment) return;
    this.pending.delete(memberId);
    if (this.growth) {
      const at = this.growth.findIndex((g) => g.memberId === memberId);
      if (at >= 0) this.growth.splice(at, 1);
    }

    const categoryId = this.resolve(assignment.categoryId);
    const current = categoryId === null ? undefined : this.snapshot.get(categoryId);
    if (!current) return;
    const next = new Map(this.snapshot);
    const count = current.memberCount;

    if (assignment.created && current.categoryId === assignment.categoryId && count <= 1) {
      next.delete(current.categoryId);
      for (const c of Array.from(next.values())) {
        if (c.parentId === current.categoryId) next.set(c.categoryId, { ...cloneCategory(c), parentId: current.parentId });
      }
      this.log.debug('Dropped category of an unstored reflection', { categoryId: current.categoryId });
    } else {
      let centroid = current.centroid ? current.centroid.slice() : null;
      if (embedding && current.centroid && assignment.generation === this.generation && count > 1) {
        centroid = foldOut(current.centroid, embedding, count);
      }
      next.set(current.categoryId, { ...cloneCategory(current), centroid, memberCount: Math.max(0, count - 1) });
    }
    this.snapshot = next;
  }

  /** The live category `categoryId` stands for after merges, or null once it is gone. */
  resolve(categoryId: CategoryId): CategoryId | null {
    const at = follow(this.retired, categoryId);
    return at !== null && this.snapshot.has(at) ? at : null;
  }

  /** Read-only: the category a query embedding falls into, if any. */
  nearest(embedding: Vector): CategoryId | null {
    const hit = this.nearestIn(this.snapshot, embedding);
    return hit && hit.distance <= this.opts.assignmentThreshold ? hit.category.categoryId : null;
  }

  /**
   * Batch merge / split / decay pass over the current membership. Members are
   * loaded first; everything after that runs without yielding, so the
   * published result is never partial. A second call while one is running
   * joins it.
   */
  recluster(loadMembers: () => Promise<ClusterMember[]>): Promise<CategoryClusterReport> {
    if (this.running) return this.running;
    const run = this.runRecluster(loadMembers).finally(() => {
      this.running = null;
      this.growth = null;
    });
    this.running = run;
    return run;
  }

  exportState(): CategoryState {
    return { version: 1, categories: this.list() };
  }

  /** Replaces the current snapshot; returns how many categories were accepted. */
  importState(state: unknown): number {
    if (typeof state !== 'object' || state === null || !('categories' in state) || !Array.isArray(state.categories)) {
      this.log.warn('Ignoring category state without a categories list');
      return 0;
    }
    const next = new Map<CategoryId, CategoryCentroid>();
    for (const item of state.categories) {
      const parsed = parseCategory(item);
      if (parsed) next.set(parsed.categoryId, parsed);
    }
    // Parents that did not survive parsing become roots
    for (const c of next.values()) {
      if (c.parentId !== null && !next.has(c.parentId)) c.parentId = null;
    }
    this.snapshot = next;
    this.generation++;
    this.retired.clear();
    return next.size;
  }

  private track(assignment: Assignment, memberId: ReflectionId | undefined): Assignment {
    if (memberId !== undefined) this.pending.set(memberId, { ...assignment, generation: this.generation });
    this.growth?.push({ memberId: memberId ?? null, categoryId: assignment.categoryId });
    return assignment;
  }

  private nearestIn(snapshot: Snapshot, embedding: Vector): Nearest | null {
    let best: Nearest | null = null;
    for (const category of snapshot.values()) {
      if (!category.centroid || category.decayed) continue;
      const distance = cosineDistance(category.centroid, embedding);
      if (!best || distance < best.distance) best = { category, distance };
    }
    return best;
  }

  private async runRecluster(loadMembers: () => Promise<ClusterMember[]>): Promise<CategoryClusterReport> {
    const growth: Growth[] = [];
    this.growth = growth;
    const members = await loadMembers();
    const started = this.now();
    const opts = this.opts;

    const work = new Map<CategoryId, CategoryCentroid>();
    for (const [id, c] of this.snapshot) work.set(id, cloneCategory(c));
    const retiring = new Map<CategoryId, CategoryId | null>();

    // Assignments the loaded members do not show yet: unsettled, or made during the load
    const loaded = new Set(members.map((m) => m.id));
    const unseen: Growth[] = [];
    for (const [memberId, a] of this.pending) {
      if (!loaded.has(memberId)) unseen.push({ memberId, categoryId: a.categoryId });
    }
    for (const g of growth) {
      if (g.memberId === null || (!loaded.has(g.memberId) && !this.pending.has(g.memberId))) unseen.push(g);
    }
    const unseenCount = new Map<CategoryId, number>();
    for (const g of unseen) {
      const at = follow(this.retired, g.categoryId);
      if (at !== null && work.has(at)) unseenCount.set(at, (unseenCount.get(at) ?? 0) + 1);
    }

    const report: CategoryClusterReport = {
      merged: [],
      split: [],
      decayed: [],
      removed: [],
      reassigned: {},
      categoryCount: 0,
      silhouette: 1,
      durationMs: 0,
      completedAt: '',
    };

    // Current membership, by category
    const placement = new Map<ReflectionId, CategoryId | null>();
    const move = (member: ClusterMember, to: CategoryId | null) => {
      placement.set(member.id, to);
      if (to !== member.categoryId) report.reassigned[member.id] = to;
      else delete report.reassigned[member.id];
    };
    for (const m of members) {
      const at = m.categoryId === null ? null : follow(this.retired, m.categoryId);
      move(m, at !== null && work.has(at) ? at : null);
    }

    // Embedded members sitting in a centroid-less category move to the nearest centroid
    const anchored = new Map(Array.from(work).filter(([, c]) => c.centroid !== null));
    for (const m of members) {
      if (!m.embedding) continue;
      const at = placement.get(m.id) ?? null;
      if (at !== null && work.get(at)?.centroid) continue;
      const hit = this.nearestIn(anchored, m.embedding);
      if (hit && hit.distance <= opts.assignmentThreshold) move(m, hit.category.categoryId);
    }

    const membersOf = (id: CategoryId) => members.filter((m) => placement.get(m.id) === id);
    const refit = (c: CategoryCentroid) => {
      const own = membersOf(c.categoryId);
      const embedded = own.flatMap((m) => (m.embedding ? [m.embedding] : []));
      c.memberCount = own.length + (unseenCount.get(c.categoryId) ?? 0);
      if (embedded.length > 0) c.centroid = mean(embedded);
    };
    for (const c of work.values()) refit(c);

    // Merge closest live pairs until none is under the threshold
    for (;;) {
      let pair: { a: CategoryCentroid; b: CategoryCentroid; distance: number } | null = null;
      const live = Array.from(work.values()).filter((c) => c.centroid !== null && !c.decayed);
      for (let i = 0; i < live.length; i++) {
        for (let j = i + 1; j < live.length; j++) {
          const a = live[i];
          const b = live[j];
          if (!a.centroid || !b.centroid) continue;
          const distance = cosineDistance(a.centroid, b.centroid);
          if (distance < opts.mergeThreshold && (!pair || distance < pair.distance)) pair = { a, b, distance };
        }
      }
      if (!pair) break;
      const [into, from] = pair.a.memberCount >= pair.b.memberCount ? [pair.a, pair.b] : [pair.b, pair.a];
      if (into.centroid && from.centroid) {
        into.centroid = weightedMean(into.centroid, into.memberCount, from.centroid, from.memberCount);
      }
      into.memberCount += from.memberCount;
      into.lastGrewAt = Math.max(into.lastGrewAt, from.lastGrewAt);
      for (const m of members) if (placement.get(m.id) === from.categoryId) move(m, into.categoryId);
      this.reparent(work, from.categoryId, into.categoryId);
      if (into.parentId === from.categoryId) into.parentId = from.parentId;
      work.delete(from.categoryId);
      retiring.set(from.categoryId, into.categoryId);
      report.merged.push({ from: from.categoryId, into: into.categoryId, distance: pair.distance });
    }

    // Split loose categories into two by 2-means over their members
    for (const c of Array.from(work.values())) {
      const own = membersOf(c.categoryId).filter((m) => m.embedding !== null);
      if (own.length < opts.minSplitMembers || !c.centroid) continue;
      const variance = meanDistance(own, c.centroid);
      if (variance <= opts.splitThreshold) continue;
      const halves = twoMeans(own);
      if (!halves) continue;
      const createdId = this.newId();
      work.set(createdId, {
        categoryId: createdId,
        parentId: c.parentId,
        centroid: halves.centroids[1],
        memberCount: halves.groups[1].length,
        keywords: [],
        createdAt: started,
        lastGrewAt: started,
        lastReclusteredAt: null,
        decayed: false,
      });
      for (const m of halves.groups[1]) move(m, createdId);
      c.centroid = halves.centroids[0];
      c.memberCount -= halves.groups[1].length;
      report.split.push({ source: c.categoryId, created: createdId, variance });
    }

    // Decay and removal
    for (const c of Array.from(work.values())) {
      const stale = started - c.lastGrewAt > opts.decayWindowMs;
      if (stale && !c.decayed) report.decayed.push(c.categoryId);
      c.decayed = stale;
      if (stale && c.memberCount === 0) {
        this.reparent(work, c.categoryId, c.parentId);
        work.delete(c.categoryId);
        retiring.set(c.categoryId, null);
        report.removed.push(c.categoryId);
      }
    }

    for (const c of work.values()) {
      const texts = membersOf(c.categoryId).map((m) => m.content);
      if (texts.length > 0) c.keywords = this.keywords.extract(...texts);
      c.lastReclusteredAt = started;
    }

    // Unseen reflections in a merged category follow it; the writer fixes up the rest
    for (const g of unseen) {
      if (g.memberId === null) continue;
      const before = follow(this.retired, g.categoryId);
      const at = before === null ? null : follow(retiring, before);
      if (at !== g.categoryId) report.reassigned[g.memberId] = at;
    }

    breakCycles(work);
    report.silhouette = silhouette(members, placement);
    for (const [from, into] of retiring) this.retired.set(from, into);
    this.snapshot = work;
    this.generation++;
    report.categoryCount = work.size;
    report.durationMs = this.now() - started;
    report.completedAt = new Date(this.now()).toISOString();
    this.log.info('Recluster complete', {
      categories: report.categoryCount,
      merged: report.merged.length,
      split: report.split.length,
      decayed: report.decayed.length,
      removed: report.removed.length,
      reassigned: Object.keys(report.reassigned).length,
    });
    return report;
  }

  private reparent(work: Map<CategoryId, CategoryCentroid>, from: CategoryId, to: CategoryId | null): void {
    for (const c of work.values()) if (c.parentId === from && c.categoryId !== to) c.parentId = to;
  }
}

function follow(retired: ReadonlyMap<CategoryId, CategoryId | null>, categoryId: CategoryId): CategoryId | null {
  const seen = new Set<CategoryId>();
  let at: CategoryId | null = categoryId;
  while (at !== null && retired.has(at) && !seen.has(at)) {
    seen.add(at);
    at = retired.get(at) ?? null;
  }
  return at;
}

/** Merges can leave a parent chain looping back on itself; such a category becomes a root. */
function breakCycles(work: Map<CategoryId, CategoryCentroid>): void {
  for (const c of work.values()) {
    const seen = new Set<CategoryId>([c.categoryId]);
    let parent = c.parentId;
    while (parent !== null) {
      if (seen.has(parent)) {
        c.parentId = null;
        break;
      }
      seen.add(parent);
      parent = work.get(parent)?.parentId ?? null;
    }
  }
}

function cloneCategory(c: Readonly<CategoryCentroid>): CategoryCentroid {
  return { ...c, centroid: c.centroid ? c.centroid.slice() : null, keywords: [...c.keywords] };
}

function meanDistance(members: ClusterMember[], centroid: Vector): number {
  let total = 0;
  let n = 0;
  for (const m of members) {
    if (!m.embedding) continue;
    total += cosineDistance(m.embedding, centroid);
    n++;
  }
  return n === 0 ? 0 : total / n;
}

interface Halves {
  groups: [ClusterMember[], ClusterMember[]];
  centroids: [Vector, Vector];
}

/** Seeds with the farthest pair heuristic, then Lloyd iterations. Null when a side ends up empty. */
function twoMeans(members: ClusterMember[]): Halves | null {
  const points = members.flatMap((m) => (m.embedding ? [{ m, v: m.embedding }] : []));
  if (points.length < 2) return null;
  const center = mean(points.map((p) => p.v));
  if (!center) return null;
  const farthestFrom = (from: Vector) =>
    points.reduce((best, p) => (cosineDistance(p.v, from) > cosineDistance(best.v, from) ? p : best), points[0]);
  const seedA = farthestFrom(center);
  const seedB = farthestFrom(seedA.v);
  if (seedA === seedB) return null;

  let centroids: [Vector, Vector] = [seedA.v.slice(), seedB.v.slice()];
  let groups: [ClusterMember[], ClusterMember[]] = [[], []];
  for (let round = 0; round < KMEANS_ROUNDS; round++) {
    const next: [ClusterMember[], ClusterMember[]] = [[], []];
    for (const p of points) {
      next[cosineDistance(p.v, centroids[0]) <= cosineDistance(p.v, centroids[1]) ? 0 : 1].push(p.m);
    }
    const a = mean(next[0].flatMap((m) => (m.embedding ? [m.embedding] : [])));
    const b = mean(next[1].flatMap((m) => (m.embedding ? [m.embedding] : [])));
    if (!a || !b) return null;
    const settled = sameGroups(groups, next);
    groups = next;
    centroids = [a, b];
    if (settled) break;
  }
  return { groups, centroids };
}

function sameGroups(a: [ClusterMember[], ClusterMember[]], b: [ClusterMember[], ClusterMember[]]): boolean {
  return a.every((g, i) => g.length === b[i].length && g.every((m, j) => m.id === b[i][j].id));
}

function silhouette(members: ClusterMember[], placement: Map<ReflectionId, CategoryId | null>): number {
  const byCategory = new Map<CategoryId, Vector[]>();
  for (const m of members) {
    const at = placement.get(m.id);
    if (!m.embedding || !at) continue;
    const list = byCategory.get(at) ?? [];
    list.push(m.embedding);
    byCategory.set(at, list);
  }
  if (byCategory.size < 2) return 1;
  const clusters = Array.from(byCategory.values());
  let total = 0;
  let n = 0;
  clusters.forEach((own, ci) => {
    for (const v of own) {
      if (own.length < 2) {
        n++;
        continue;
      }
      const a = own.reduce((s, o) => s + (o === v ? 0 : cosineDistance(v, o)), 0) / (own.length - 1);
      let b = Infinity;
      clusters.forEach((other, oi) => {
        if (oi === ci) return;
        b = Math.min(b, other.reduce((s, o) => s + cosineDistance(v, o), 0) / other.length);
      });
      const denom = Math.max(a, b);
      total += denom === 0 ? 0 : (b - a) / denom;
      n++;
    }
  });
  return n === 0 ? 1 : total / n;
}

function parseCategory(value: unknown): CategoryCentroid | null {
  if (typeof value !== 'object' || value === null) return null;
  const c: Record<string, unknown> = { ...value };
  const numberOrNull = (v: unknown): v is number | null => v === null || typeof v === 'number';
  const centroid = c.centroid;
  const validCentroid = centroid === null || (Array.isArray(centroid) && centroid.every((x) => typeof x === 'number'));
  if (
    typeof c.categoryId !== 'string' ||
    !(c.parentId === null || typeof c.parentId === 'string') ||
    !validCentroid ||
    typeof c.memberCount !== 'number' ||
    !Array.isArray(c.keywords) ||
    typeof c.createdAt !== 'number' ||
    typeof c.lastGrewAt !== 'number' ||
    !numberOrNull(c.lastReclusteredAt)
  ) {
    return null;
  }
  return {
    categoryId: c.categoryId,
    parentId: c.parentId,
    centroid: Array.isArray(centroid) ? centroid.map(Number) : null,
    memberCount: c.memberCount,
    keywords: c.keywords.filter((k): k is string => typeof k === 'string'),
    createdAt: c.createdAt,
    lastGrewAt: c.lastGrewAt,
    lastReclusteredAt: c.lastReclusteredAt,
    decayed: c.decayed === true,
  };
}
