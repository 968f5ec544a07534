import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { KnowledgeStore, toFtsQuery } from '../store.js';
import { CrossProjectReferenceError, ProjectConflictError, ProjectNotFoundError } from '../errors.js';
import type { Project } from '../types.js';
import { COFFEE_NOTE, TEA_NOTE, draftFor, steppingClock } from './fixtures.js';

describe('KnowledgeStore', () => {
  let store: KnowledgeStore;
  let project: Project;

  beforeEach(() => {
    store = KnowledgeStore.openSync({ databasePath: ':memory:', clock: steppingClock() });
    project = store.createProject({ name: 'main', rootPath: '/notes' });
  });

  afterEach(() => {
    store.close();
  });

  describe('projects', () => {
    it('makes the first project the default', () => {
      assert.strictEqual(project.isDefault, true);
      assert.strictEqual(project.permalink, 'main');
      const second = store.createProject({ name: 'Work Notes', rootPath: '/work' });
      assert.strictEqual(second.isDefault, false);
      assert.strictEqual(second.permalink, 'work-notes');
      assert.strictEqual(store.defaultProject()?.name, 'main');
    });

    it('finds projects by name or permalink regardless of case', () => {
      store.createProject({ name: 'Work Notes', rootPath: '/work' });
      assert.strictEqual(store.getProject('work notes')?.name, 'Work Notes');
      assert.strictEqual(store.getProject('WORK-NOTES')?.name, 'Work Notes');
      assert.strictEqual(store.getProject('missing'), null);
      assert.throws(() => store.requireProject('missing'), ProjectNotFoundError);
    });

    it('rejects duplicate names', () => {
      assert.throws(() => store.createProject({ name: 'MAIN', rootPath: '/other' }), ProjectConflictError);
    });

    it('moves the default flag', () => {
      const work = store.createProject({ name: 'work', rootPath: '/work' });
      store.setDefaultProject(work.id);
      assert.strictEqual(store.defaultProject()?.name, 'work');
      assert.strictEqual(store.getProject('main')?.isDefault, false);
    });

    it('hands the default to the oldest project when the default is removed', () => {
      store.createProject({ name: 'work', rootPath: '/work' });
      store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE));
      store.removeProject(project.id);
      assert.deepStrictEqual(store.listProjects().map(p => [p.name, p.isDefault]), [['work', true]]);
    });

    it('lists projects by name', () => {
      store.createProject({ name: 'beta', rootPath: '/b' });
      store.createProject({ name: 'Alpha', rootPath: '/a' });
      assert.deepStrictEqual(store.listProjects().map(p => p.name), ['Alpha', 'beta', 'main']);
    });
  });

  describe('upsertEntity', () => {
    it('stores observations and a dangling relation', () => {
      const { entity, created } = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE));
      assert.strictEqual(created, true);
      assert.strictEqual(entity.title, 'Coffee');
      assert.strictEqual(entity.permalink, 'coffee');

      const observations = store.getObservations(project.id, entity.id);
      assert.deepStrictEqual(observations.map(o => [o.category, o.content, o.tags]), [
        ['method', 'Pour over is best #brewing', ['brewing']],
      ]);

      const relations = store.getOutboundRelations(project.id, entity.id);
      assert.strictEqual(relations.length, 1);
      assert.strictEqual(relations[0].relationType, 'relates_to');
      assert.strictEqual(relations[0].targetTitle, 'Tea');
      assert.strictEqual(relations[0].toEntityId, null);
    });

    it('resolves dangling relations when the target appears', () => {
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      const tea = store.upsertEntity(project.id, draftFor('tea.md', TEA_NOTE));
      assert.strictEqual(tea.resolvedInbound, 1);
      assert.strictEqual(store.getOutboundRelations(project.id, coffee.id)[0].toEntityId, tea.entity.id);
      assert.deepStrictEqual(store.getInboundRelations(project.id, tea.entity.id).map(r => r.fromEntityId), [coffee.id]);
      assert.deepStrictEqual(store.getDanglingRelations(project.id), []);
    });

    it('resolves a relation to an existing target immediately', () => {
      const tea = store.upsertEntity(project.id, draftFor('tea.md', TEA_NOTE)).entity;
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      assert.strictEqual(store.getOutboundRelations(project.id, coffee.id)[0].toEntityId, tea.id);
    });

    it('gives colliding titles numbered permalinks', () => {
      const first = store.upsertEntity(project.id, draftFor('a/notes.md', '# Notes\n')).entity;
      const second = store.upsertEntity(project.id, draftFor('b/notes.md', '# Notes\n')).entity;
      assert.strictEqual(first.permalink, 'notes');
      assert.strictEqual(second.permalink, 'notes-1');
    });

    it('keeps the permalink and id on update', () => {
      const first = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      const updated = store.upsertEntity(project.id, draftFor('coffee.md', '# Coffee Beans\n- [origin] Ethiopia\n'));
      assert.strictEqual(updated.created, false);
      assert.strictEqual(updated.entity.id, first.id);
      assert.strictEqual(updated.entity.permalink, 'coffee');
      assert.strictEqual(updated.entity.title, 'Coffee Beans');
      assert.deepStrictEqual(store.getObservations(project.id, first.id).map(o => o.content), ['Ethiopia']);
      assert.deepStrictEqual(store.getOutboundRelations(project.id, first.id), []);
    });

    it('keeps relation ids while the relation stays the same', () => {
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      const before = store.getOutboundRelations(project.id, coffee.id)[0].id;
      store.upsertEntity(project.id, draftFor('coffee.md', `${COFFEE_NOTE}- [extra] More\n`));
      assert.strictEqual(store.getOutboundRelations(project.id, coffee.id)[0].id, before);
    });

    it('honors an explicit permalink', () => {
      const entity = store.upsertEntity(project.id, draftFor('x.md', '---\npermalink: Custom Link\n---\n')).entity;
      assert.strictEqual(entity.permalink, 'custom-link');
      assert.strictEqual(store.getEntityByPermalink(project.id, 'custom-link')?.id, entity.id);
    });
  });

  describe('deleteEntity', () => {
    it('leaves inbound relations dangling', () => {
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      store.upsertEntity(project.id, draftFor('tea.md', TEA_NOTE));
      const removed = store.deleteEntityByPath(project.id, 'tea.md');
      assert.strictEqual(removed?.title, 'Tea');
      const relation = store.getOutboundRelations(project.id, coffee.id)[0];
      assert.strictEqual(relation.toEntityId, null);
      assert.strictEqual(relation.targetTitle, 'Tea');
      assert.strictEqual(store.stats(project.id).danglingRelations, 1);
    });

    it('points inbound relations at another entity that still matches', () => {
      const first = store.upsertEntity(project.id, draftFor('a/Notes.md', 'first\n')).entity;
      const second = store.upsertEntity(project.id, draftFor('b/Notes.md', 'second\n')).entity;
      const source = store.upsertEntity(project.id, draftFor('src.md', '- relates_to [[Notes]]\n')).entity;
      assert.strictEqual(store.getOutboundRelations(project.id, source.id)[0].toEntityId, first.id);

      store.deleteEntityByPath(project.id, 'a/Notes.md');
      assert.strictEqual(store.getOutboundRelations(project.id, source.id)[0].toEntityId, second.id);
      assert.strictEqual(store.stats(project.id).danglingRelations, 0);
    });

    it('removes observations and outbound relations with the entity', () => {
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      assert.strictEqual(store.deleteEntity(project.id, coffee.id), true);
      assert.deepStrictEqual(store.stats(project.id), { entities: 0, observations: 0, relations: 0, danglingRelations: 0 });
      assert.strictEqual(store.deleteEntity(project.id, coffee.id), false);
    });

    it('returns null for an unknown path', () => {
      assert.strictEqual(store.deleteEntityByPath(project.id, 'nope.md'), null);
    });
  });

  describe('moveEntity', () => {
    it('keeps the id and permalink by default', () => {
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      const result = store.moveEntity(project.id, 'coffee.md', 'archive/coffee.md');
      assert.ok(result.moved);
      if (!result.moved) return;
      assert.strictEqual(result.entity.id, coffee.id);
      assert.strictEqual(result.entity.filePath, 'archive/coffee.md');
      assert.strictEqual(result.entity.permalink, 'coffee');
      assert.strictEqual(store.getObservations(project.id, coffee.id).length, 1);
    });

    it('derives a permalink from the new path when asked', () => {
      store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE));
      const result = store.moveEntity(project.id, 'coffee.md', 'archive/Old Coffee.md', { regeneratePermalink: true });
      assert.ok(result.moved);
      if (result.moved) assert.strictEqual(result.entity.permalink, 'archive/old-coffee');
    });

    it('reports a missing source and an occupied destination', () => {
      store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE));
      const tea = store.upsertEntity(project.id, draftFor('tea.md', TEA_NOTE)).entity;
      assert.deepStrictEqual(store.moveEntity(project.id, 'nope.md', 'x.md'), { moved: false, reason: 'not-found' });
      const conflict = store.moveEntity(project.id, 'coffee.md', 'tea.md');
      assert.strictEqual(conflict.moved, false);
      if (!conflict.moved && conflict.reason === 'conflict') assert.strictEqual(conflict.occupant.id, tea.id);
    });

    it('replaces the entity at an occupied destination when asked', () => {
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      store.upsertEntity(project.id, draftFor('tea.md', TEA_NOTE));
      const result = store.moveEntity(project.id, 'coffee.md', 'tea.md', { replaceOccupant: true });
      assert.ok(result.moved);
      assert.strictEqual(store.getEntityByPath(project.id, 'tea.md')?.id, coffee.id);
      assert.strictEqual(store.getEntityByPath(project.id, 'coffee.md'), null);
      assert.deepStrictEqual(store.stats(project.id), { entities: 1, observations: 1, relations: 1, danglingRelations: 1 });
    });
  });

  describe('lookups', () => {
    it('resolves link text by permalink, title and path', () => {
      const coffee = store.upsertEntity(project.id, draftFor('drinks/coffee.md', COFFEE_NOTE)).entity;
      assert.strictEqual(store.resolveLink(project.id, 'coffee')?.id, coffee.id);
      assert.strictEqual(store.resolveLink(project.id, 'COFFEE')?.id, coffee.id);
      assert.strictEqual(store.resolveLink(project.id, 'drinks/coffee')?.id, coffee.id);
      assert.strictEqual(store.resolveLink(project.id, 'drinks/coffee.md')?.id, coffee.id);
      assert.strictEqual(store.resolveLink(project.id, 'tea'), null);
    });

    it('matches permalink globs', () => {
      store.upsertEntity(project.id, draftFor('specs/api.md', '---\npermalink: specs/api\n---\n'));
      store.upsertEntity(project.id, draftFor('specs/db.md', '---\npermalink: specs/db\n---\n'));
      store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE));
      assert.deepStrictEqual(store.findByPermalinkGlob(project.id, 'specs/*').map(e => e.permalink), ['specs/api', 'specs/db']);
    });

    it('reports file state for diffing', () => {
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      assert.deepStrictEqual(store.fileState(project.id), new Map([['coffee.md', { entityId: coffee.id, checksum: coffee.checksum }]]));
    });

    it('refuses to read another project\'s entity', () => {
      const work = store.createProject({ name: 'work', rootPath: '/work' });
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      assert.throws(() => store.getEntity(work.id, coffee.id), CrossProjectReferenceError);
    });

    it('keeps projects isolated', () => {
      const work = store.createProject({ name: 'work', rootPath: '/work' });
      store.upsertEntity(work.id, draftFor('tea.md', TEA_NOTE));
      const coffee = store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE)).entity;
      assert.strictEqual(store.getOutboundRelations(project.id, coffee.id)[0].toEntityId, null);
      assert.strictEqual(store.getEntityByPermalink(project.id, 'tea'), null);
    });
  });

  describe('query and search', () => {
    beforeEach(() => {
      store.upsertEntity(project.id, draftFor('coffee.md', COFFEE_NOTE));
      store.upsertEntity(project.id, draftFor('tea.md', TEA_NOTE));
      store.upsertEntity(project.id, draftFor('specs/api.md', '---\ntype: spec\ntags: [design]\n---\n# API\nEndpoints\n'));
    });

    it('lists newest first', () => {
      const page = store.query(project.id);
      assert.deepStrictEqual(page.items.map(e => e.title), ['API', 'Tea', 'Coffee']);
      assert.strictEqual(page.total, 3);
      assert.strictEqual(page.hasMore, false);
    });

    it('filters by folder, type and time', () => {
      assert.deepStrictEqual(store.query(project.id, { folder: 'specs/' }).items.map(e => e.title), ['API']);
      assert.deepStrictEqual(store.query(project.id, { entityTypes: ['spec'] }).items.map(e => e.title), ['API']);
      const tea = store.getEntityByPath(project.id, 'tea.md');
      assert.ok(tea);
      assert.deepStrictEqual(
        store.query(project.id, { updatedAfter: tea.updatedAt }).items.map(e => e.title),
        ['API', 'Tea'],
      );
    });

    it('paginates', () => {
      const page = store.query(project.id, {}, { page: 2, pageSize: 2 });
      assert.deepStrictEqual(page.items.map(e => e.title), ['Coffee']);
      assert.strictEqual(page.total, 3);
      assert.strictEqual(page.hasMore, false);
      assert.strictEqual(store.query(project.id, {}, { page: 1, pageSize: 2 }).hasMore, true);
    });

    it('finds body text with a highlighted snippet', () => {
      const page = store.search(project.id, { text: 'pour' });
      assert.deepStrictEqual(page.items.map(h => h.entity.title), ['Coffee']);
      assert.ok(page.items[0].score > 0);
      assert.ok(page.items[0].snippet?.includes('**Pour**'));
    });

    it('filters by tags from frontmatter or observations', () => {
      assert.deepStrictEqual(store.search(project.id, { tags: ['#brewing'] }).items.map(h => h.entity.title), ['Coffee']);
      assert.deepStrictEqual(store.search(project.id, { tags: ['design'] }).items.map(h => h.entity.title), ['API']);
    });

    it('lists by recency without a query', () => {
      const page = store.search(project.id, { text: '  ' });
      assert.deepStrictEqual(page.items.map(h => [h.entity.title, h.score, h.snippet]), [
        ['API', 0, null], ['Tea', 0, null], ['Coffee', 0, null],
      ]);
    });

    it('returns nothing for queries with no searchable terms', () => {
      assert.strictEqual(store.search(project.id, { text: '" ??' }).total, 0);
    });

    it('rebuilds the search index', () => {
      assert.strictEqual(store.rebuildSearchIndex(project.id), 3);
      assert.deepStrictEqual(store.search(project.id, { text: 'caffeine' }).items.map(h => h.entity.title), ['Tea']);
    });

    it('clears a project but keeps it', () => {
      assert.strictEqual(store.clearProject(project.id), 3);
      assert.strictEqual(store.stats(project.id).entities, 0);
      assert.strictEqual(store.search(project.id, { text: 'tea' }).total, 0);
      assert.ok(store.getProject('main'));
    });
  });
});

describe('toFtsQuery', () => {
  it('quotes and prefix-matches terms', () => {
    assert.strictEqual(toFtsQuery('coffee brew'), '"coffee"* "brew"*');
  });

  it('passes boolean operators between terms', () => {
    assert.strictEqual(toFtsQuery('coffee AND tea'), '"coffee"* AND "tea"*');
    assert.strictEqual(toFtsQuery('OR tea AND'), '"tea"*');
  });

  it('keeps phrases and strips tag markers', () => {
    assert.strictEqual(toFtsQuery('"pour over" #brewing'), '"pour over" "brewing"*');
  });

  it('returns null when nothing is searchable', () => {
    assert.strictEqual(toFtsQuery('?! --'), null);
  });
});
