import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { buildContext, parseTimeframe, resolveReference } from '../context.js';
import { KnowledgeStore } from '../store.js';
import { InvalidReferenceError } from '../errors.js';
import type { Clock, Project } from '../types.js';
import { draftFor, steppingClock } from './fixtures.js';

function fixedClock(iso: string): Clock {
  return { now: () => new Date(iso), isoNow: () => iso };
}

describe('parseTimeframe', () => {
  const now = new Date('2024-01-10T12:00:00.000Z');

  it('understands day names', () => {
    assert.strictEqual(parseTimeframe('today', now)?.toISOString(), '2024-01-10T00:00:00.000Z');
    assert.strictEqual(parseTimeframe('Yesterday', now)?.toISOString(), '2024-01-09T00:00:00.000Z');
  });

  it('understands relative amounts', () => {
    assert.strictEqual(parseTimeframe('7d', now)?.toISOString(), '2024-01-03T12:00:00.000Z');
    assert.strictEqual(parseTimeframe('24h ago', now)?.toISOString(), '2024-01-09T12:00:00.000Z');
    assert.strictEqual(parseTimeframe('2 weeks', now)?.toISOString(), '2023-12-27T12:00:00.000Z');
    assert.strictEqual(parseTimeframe('30 minutes', now)?.toISOString(), '2024-01-10T11:30:00.000Z');
    assert.strictEqual(parseTimeframe('1mo', now)?.toISOString(), '2023-12-11T12:00:00.000Z');
  });

  it('accepts ISO dates', () => {
    assert.strictEqual(parseTimeframe('2024-01-01', now)?.toISOString(), '2024-01-01T00:00:00.000Z');
    assert.strictEqual(parseTimeframe('2024-01-05T06:00:00Z', now)?.toISOString(), '2024-01-05T06:00:00.000Z');
  });

  it('returns null for anything else', () => {
    assert.strictEqual(parseTimeframe('soon', now), null);
    assert.strictEqual(parseTimeframe('5 parsecs', now), null);
    assert.strictEqual(parseTimeframe('2024-13-45', now), null);
    assert.strictEqual(parseTimeframe('', now), null);
  });
});

describe('buildContext', () => {
  let store: KnowledgeStore;
  let storeClock: ReturnType<typeof steppingClock>;
  let project: Project;
  const clock = fixedClock('2024-01-10T00:00:00.000Z');

  // a -> b -> c -> a, and c -> Ghost (dangling); updated on Jan 1, 5 and 9
  beforeEach(() => {
    storeClock = steppingClock();
    store = KnowledgeStore.openSync({ databasePath: ':memory:', clock: storeClock });
    project = store.createProject({ name: 'main', rootPath: '/notes' });
    storeClock.set('2024-01-01T00:00:00.000Z');
    store.upsertEntity(project.id, draftFor('a.md', '# A\n- [fact] First\n- next [[B]]\n'));
    storeClock.set('2024-01-05T00:00:00.000Z');
    store.upsertEntity(project.id, draftFor('b.md', '# B\n- next [[C]]\n'));
    storeClock.set('2024-01-09T00:00:00.000Z');
    store.upsertEntity(project.id, draftFor('c.md', '# C\n- next [[A]]\n- next [[Ghost]]\n'));
  });

  afterEach(() => {
    store.close();
  });

  function titles(entities: ReadonlyArray<{ entity: { title: string } }>): string[] {
    return entities.map(n => n.entity.title);
  }

  it('returns the primary entity with observations and one hop of neighbours', () => {
    const snapshot = buildContext(store, project, 'a', { clock });
    assert.deepStrictEqual(titles(snapshot.primary), ['A']);
    assert.deepStrictEqual(snapshot.primary[0].observations.map(o => o.content), ['First']);
    assert.deepStrictEqual(snapshot.related.map(n => [n.entity.title, n.depth]), [['B', 1], ['C', 1]]);
    assert.deepStrictEqual(snapshot.edges.map(r => r.targetTitle), ['B', 'C', 'A', 'Ghost']);
    assert.strictEqual(snapshot.metadata.generatedAt, '2024-01-10T00:00:00.000Z');
  });

  it('terminates on cycles', () => {
    const snapshot = buildContext(store, project, 'a', { depth: 5, clock });
    assert.deepStrictEqual(snapshot.related.map(n => n.entity.title), ['B', 'C']);
    assert.strictEqual(snapshot.metadata.depth, 5);
  });

  it('walks further hops from the frontier only', () => {
    const snapshot = buildContext(store, project, 'b', { depth: 2, clock });
    assert.deepStrictEqual(snapshot.related.map(n => [n.entity.title, n.depth]), [['A', 1], ['C', 1]]);
  });

  it('returns only the primary entity at depth 0', () => {
    const snapshot = buildContext(store, project, 'a', { depth: 0, clock });
    assert.deepStrictEqual(snapshot.related, []);
    assert.deepStrictEqual(snapshot.edges, []);
  });

  it('clamps depth into range', () => {
    assert.strictEqual(buildContext(store, project, 'a', { depth: 99, clock }).metadata.depth, 5);
    assert.strictEqual(buildContext(store, project, 'a', { depth: -1, clock }).metadata.depth, 0);
  });

  it('caps related entities and says so', () => {
    const snapshot = buildContext(store, project, 'a', { maxRelated: 1, clock });
    assert.deepStrictEqual(snapshot.related.map(n => n.entity.title), ['B']);
    assert.strictEqual(snapshot.metadata.relatedTruncated, true);
  });

  it('skips related entities older than the timeframe', () => {
    const snapshot = buildContext(store, project, 'a', { timeframe: '3d', clock });
    assert.deepStrictEqual(titles(snapshot.primary), ['A']);
    assert.deepStrictEqual(snapshot.related.map(n => n.entity.title), ['C']);
    assert.strictEqual(snapshot.metadata.since, '2024-01-07T00:00:00.000Z');
  });

  it('rejects an unrecognized timeframe', () => {
    assert.throws(() => buildContext(store, project, 'a', { timeframe: 'whenever', clock }), InvalidReferenceError);
  });

  it('paginates glob matches', () => {
    const first = buildContext(store, project, '*', { pageSize: 2, clock });
    assert.deepStrictEqual(titles(first.primary), ['A', 'B']);
    assert.strictEqual(first.metadata.totalPrimary, 3);
    assert.strictEqual(first.metadata.hasMore, true);

    const second = buildContext(store, project, '*', { page: 2, pageSize: 2, depth: 0, clock });
    assert.deepStrictEqual(titles(second.primary), ['C']);
    assert.strictEqual(second.metadata.hasMore, false);
  });

  it('returns an empty snapshot for an unknown reference', () => {
    const snapshot = buildContext(store, project, 'missing', { clock });
    assert.deepStrictEqual(snapshot.primary, []);
    assert.strictEqual(snapshot.metadata.totalPrimary, 0);
  });
});

describe('resolveReference', () => {
  let store: KnowledgeStore;
  let project: Project;

  beforeEach(() => {
    store = KnowledgeStore.openSync({ databasePath: ':memory:', clock: steppingClock() });
    project = store.createProject({ name: 'main', rootPath: '/notes' });
    store.upsertEntity(project.id, draftFor('coffee.md', '# Coffee Beans\n'));
    store.upsertEntity(project.id, draftFor('notes/fancy.md', '---\ntitle: Fancy Title\npermalink: custom\n---\n'));
  });

  afterEach(() => {
    store.close();
  });

  function resolved(reference: string): string[] {
    return resolveReference(store, project, reference).map(e => e.filePath);
  }

  it('tries permalink, then normalized permalink, title and path', () => {
    assert.deepStrictEqual(resolved('coffee-beans'), ['coffee.md']);
    assert.deepStrictEqual(resolved('Coffee Beans'), ['coffee.md']);
    assert.deepStrictEqual(resolved('fancy title'), ['notes/fancy.md']);
    assert.deepStrictEqual(resolved('notes/fancy'), ['notes/fancy.md']);
    assert.deepStrictEqual(resolved('notes/fancy.md'), ['notes/fancy.md']);
  });

  it('returns nothing for blank or unknown references', () => {
    assert.deepStrictEqual(resolved('  '), []);
    assert.deepStrictEqual(resolved('nothing'), []);
  });
});
