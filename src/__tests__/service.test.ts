import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import { KnowledgeService } from '../service.js';
import { KnowledgeStore } from '../store.js';
import { SyncOrchestrator } from '../sync.js';
import { parseMarkdown, splitFrontmatter } from '../parser.js';
import { EntityNotFoundError, InvalidEditError, InvalidReferenceError, ProjectNotFoundError } from '../errors.js';
import { fileExists } from '../files.js';
import type { Clock, Project } from '../types.js';
import { cleanupTempDir, createTempDir, steppingClock, writeNote } from './fixtures.js';

const serviceClock: Clock = {
  now: () => new Date('2024-01-02T00:00:00.000Z'),
  isoNow: () => '2024-01-02T00:00:00.000Z',
};

describe('KnowledgeService', () => {
  let root: string;
  let store: KnowledgeStore;
  let sync: SyncOrchestrator;
  let service: KnowledgeService;
  let project: Project;

  beforeEach(async () => {
    root = await createTempDir('kg-service-test');
    store = KnowledgeStore.openSync({ databasePath: ':memory:', clock: steppingClock() });
    sync = new SyncOrchestrator({ store, clock: steppingClock() });
    service = new KnowledgeService({ store, sync, watch: false, clock: serviceClock });
    ({ project } = await service.createProject({ name: 'main', rootPath: root }));
  });

  afterEach(async () => {
    await sync.stopAll();
    store.close();
    await cleanupTempDir(root);
  });

  async function readFile(relative: string): Promise<string> {
    return await fs.readFile(path.join(root, relative), 'utf-8');
  }

  describe('writeEntity', () => {
    it('writes a note with frontmatter and indexes it', async () => {
      const result = await service.writeEntity({
        title: 'Coffee Brewing',
        folder: 'drinks',
        tags: ['#coffee'],
        content: '- [method] Pour over #brewing\n- relates_to [[Tea]]',
      });
      assert.strictEqual(result.created, true);
      assert.strictEqual(result.outcome, 'written');
      assert.strictEqual(result.permalink, 'coffee-brewing');
      assert.strictEqual(result.url, 'memory://main/coffee-brewing');
      assert.strictEqual(result.entity.filePath, 'drinks/Coffee Brewing.md');
      assert.deepStrictEqual(result.entity.tags, ['coffee']);

      const text = await readFile('drinks/Coffee Brewing.md');
      assert.ok(text.endsWith('---\n- [method] Pour over #brewing\n- relates_to [[Tea]]'));
      const draft = parseMarkdown(text, 'drinks/Coffee Brewing.md');
      assert.strictEqual(draft.title, 'Coffee Brewing');
      assert.strictEqual(draft.entityType, 'note');
      assert.strictEqual(draft.explicitPermalink, 'coffee-brewing');
      assert.strictEqual(store.getDanglingRelations(project.id).length, 1);
    });

    it('keeps hand-written frontmatter keys when overwriting', async () => {
      await writeNote(root, 'Coffee.md', '---\ntitle: Coffee\naliases: [joe]\n---\nold\n');
      const result = await service.writeEntity({ title: 'Coffee', content: 'new', entityType: 'drink' });
      assert.strictEqual(result.created, false);

      const draft = parseMarkdown(await readFile('Coffee.md'), 'Coffee.md');
      assert.deepStrictEqual(draft.frontmatter.get('aliases'), ['joe']);
      assert.strictEqual(draft.entityType, 'drink');
      assert.strictEqual(draft.body, 'new');
      assert.strictEqual(result.entity.entityType, 'drink');
    });

    it('reads back the body exactly as written', async () => {
      await service.writeEntity({ title: 'Y', content: 'hello world' });
      const { content } = await service.readEntity('Y');
      assert.ok(content !== null);
      assert.strictEqual(splitFrontmatter(content).body, 'hello world');
    });

    it('merges a frontmatter block opening the content into the file', async () => {
      await service.writeEntity({ title: 'Draft', content: '---\nstatus: draft\n---\nBody text\n' });
      const text = await readFile('Draft.md');
      assert.strictEqual(text.split('\n').filter(line => line === '---').length, 2);
      const draft = parseMarkdown(text, 'Draft.md');
      assert.strictEqual(draft.frontmatter.get('status'), 'draft');
      assert.strictEqual(draft.title, 'Draft');
      assert.strictEqual(draft.body, 'Body text\n');
    });

    it('rejects content whose frontmatter is not a mapping', async () => {
      await assert.rejects(service.writeEntity({ title: 'List', content: '---\n- a\n- b\n---\nx' }), InvalidReferenceError);
      assert.strictEqual(await fileExists(path.join(root, 'List.md')), false);
    });

    it('rejects an empty title and folders outside the project', async () => {
      await assert.rejects(service.writeEntity({ title: '  ', content: 'x' }), InvalidReferenceError);
      await assert.rejects(service.writeEntity({ title: 'Escape', content: 'x', folder: '../outside' }), InvalidReferenceError);
    });

    it('resolves a dangling relation when the target note is written', async () => {
      await service.writeEntity({ title: 'Coffee', content: '- relates_to [[Tea]]' });
      const tea = await service.writeEntity({ title: 'Tea', content: 'Leaves' });
      const coffee = store.getEntityByPermalink(project.id, 'coffee');
      assert.ok(coffee);
      assert.strictEqual(store.getOutboundRelations(project.id, coffee.id)[0].toEntityId, tea.entity.id);
    });
  });

  describe('readEntity', () => {
    beforeEach(async () => {
      await service.writeEntity({ title: 'Coffee Brewing', folder: 'drinks', content: 'Body text' });
    });

    it('finds a note by URL, permalink, title or path', async () => {
      for (const identifier of [
        'memory://main/coffee-brewing', 'coffee-brewing', 'Coffee Brewing', 'drinks/Coffee Brewing.md',
      ]) {
        const result = await service.readEntity(identifier);
        assert.strictEqual(result.entity.filePath, 'drinks/Coffee Brewing.md', identifier);
        assert.ok(result.content?.endsWith('---\nBody text'));
      }
    });

    it('reports unknown notes, projects and patterns', async () => {
      await assert.rejects(service.readEntity('nothing'), EntityNotFoundError);
      await assert.rejects(service.readEntity('memory://elsewhere/coffee-brewing'), ProjectNotFoundError);
      await assert.rejects(service.readEntity('drinks/*'), InvalidReferenceError);
    });
  });

  describe('editEntity', () => {
    it('replaces a section and reindexes the note', async () => {
      const written = await service.writeEntity({
        title: 'Coffee',
        content: '## Method\nPour over\n## Links\n- relates_to [[Tea]]',
      });
      const before = await readFile('Coffee.md');
      const frontmatterBlock = before.slice(0, before.length - splitFrontmatter(before).body.length);

      const result = await service.editEntity({
        identifier: 'coffee',
        operation: { kind: 'replace_section', section: 'Method', content: '- [method] French press' },
      });
      assert.strictEqual(result.outcome, 'written');
      assert.strictEqual(result.entity.id, written.entity.id);
      assert.strictEqual(
        await readFile('Coffee.md'),
        `${frontmatterBlock}## Method\n- [method] French press\n## Links\n- relates_to [[Tea]]`,
      );
      assert.deepStrictEqual(
        store.getObservations(project.id, written.entity.id).map(o => [o.category, o.content]),
        [['method', 'French press']],
      );
    });

    it('leaves the file alone when the edit does not apply', async () => {
      await service.writeEntity({ title: 'Coffee', content: 'Pour over' });
      const before = await readFile('Coffee.md');
      await assert.rejects(
        service.editEntity({ identifier: 'Coffee', operation: { kind: 'find_replace', findText: 'espresso', content: 'x' } }),
        InvalidEditError,
      );
      assert.strictEqual(await readFile('Coffee.md'), before);
    });
  });

  describe('listDirectory', () => {
    it('lists indexed notes under a folder', async () => {
      await service.writeEntity({ title: 'Index', content: 'Home' });
      await service.writeEntity({ title: 'Coffee', folder: 'drinks', content: 'Body' });
      await service.writeEntity({ title: 'Tea', folder: 'drinks/hot', content: 'Body' });

      const listing = service.listDirectory({ dir: '/drinks', depth: 2 });
      assert.strictEqual(listing.dir, 'drinks');
      assert.deepStrictEqual(listing.entries.map(e => e.path), ['drinks/hot', 'drinks/hot/Tea.md', 'drinks/Coffee.md']);
      assert.strictEqual(service.listDirectory({ depth: 50 }).depth, 10);
    });
  });

  describe('moveEntity', () => {
    it('moves the file and keeps the entity', async () => {
      const written = await service.writeEntity({ title: 'Coffee', content: 'Body' });
      const moved = await service.moveEntity('coffee', 'archive/old-coffee');
      assert.strictEqual(moved.id, written.entity.id);
      assert.strictEqual(moved.filePath, 'archive/old-coffee.md');
      assert.strictEqual(moved.permalink, 'coffee');
      assert.strictEqual(await fileExists(path.join(root, 'Coffee.md')), false);
      assert.strictEqual(await fileExists(path.join(root, 'archive', 'old-coffee.md')), true);
    });

    it('refuses to overwrite an existing file', async () => {
      await service.writeEntity({ title: 'Coffee', content: 'Body' });
      await service.writeEntity({ title: 'Tea', content: 'Body' });
      await assert.rejects(service.moveEntity('coffee', 'Tea.md'), InvalidReferenceError);
    });
  });

  describe('deleteEntity', () => {
    it('removes the file and entity and leaves inbound relations dangling', async () => {
      await service.writeEntity({ title: 'Coffee', content: '- relates_to [[Tea]]' });
      await service.writeEntity({ title: 'Tea', content: 'Leaves' });
      const removed = await service.deleteEntity('memory://main/tea');
      assert.strictEqual(removed.title, 'Tea');
      assert.strictEqual(await fileExists(path.join(root, 'Tea.md')), false);
      assert.strictEqual(store.getEntityByPermalink(project.id, 'tea'), null);
      assert.deepStrictEqual(store.getDanglingRelations(project.id).map(r => r.targetTitle), ['Tea']);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await service.writeEntity({ title: 'Coffee', content: '- [method] Pour over #brewing\n- relates_to [[Tea]]' });
      await service.writeEntity({ title: 'Tea', content: '- [fact] Less caffeine', entityType: 'drink' });
    });

    it('searches text within the default project', () => {
      const { project: searched, results } = service.search({ text: 'pour' });
      assert.strictEqual(searched.name, 'main');
      assert.deepStrictEqual(results.items.map(h => h.entity.title), ['Coffee']);
    });

    it('filters search by type and tag', () => {
      assert.deepStrictEqual(service.search({ entityTypes: ['drink'] }).results.items.map(h => h.entity.title), ['Tea']);
      assert.deepStrictEqual(service.search({ tags: ['brewing'] }).results.items.map(h => h.entity.title), ['Coffee']);
    });

    it('rejects a timeframe it cannot read', () => {
      assert.throws(() => service.search({ text: 'pour', timeframe: 'eventually' }), InvalidReferenceError);
    });

    it('builds context from a memory URL', () => {
      const { snapshot } = service.buildContext({ url: 'memory://main/coffee' });
      assert.deepStrictEqual(snapshot.primary.map(n => n.entity.title), ['Coffee']);
      assert.deepStrictEqual(snapshot.related.map(n => n.entity.title), ['Tea']);
    });

    it('lists recent activity newest first', () => {
      const { results } = service.recentActivity({});
      assert.deepStrictEqual(results.items.map(e => e.title), ['Tea', 'Coffee']);
      assert.deepStrictEqual(service.recentActivity({ timeframe: 'today' }).results.items, []);
    });

    it('reports sync status per project', () => {
      const [overview] = service.syncStatus('main');
      assert.strictEqual(overview.project.name, 'main');
      assert.deepStrictEqual(overview.stats, { entities: 2, observations: 2, relations: 1, danglingRelations: 0 });
      assert.strictEqual(overview.status.state, 'idle');
    });
  });

  describe('projects', () => {
    it('creates, defaults and removes projects', async () => {
      const workRoot = path.join(root, 'nested', 'work');
      const { project: work, scan } = await service.createProject({ name: 'work', rootPath: workRoot, setDefault: true });
      assert.strictEqual(scan.created, 0);
      assert.strictEqual(await fileExists(workRoot), true);
      assert.strictEqual(service.resolveProject().name, 'work');

      service.setDefaultProject('main');
      assert.strictEqual(service.resolveProject().name, 'main');

      await service.removeProject('work');
      assert.deepStrictEqual(service.listProjects().map(o => o.project.name), ['main']);
      assert.strictEqual(sync.hasWorker(work.id), false);
      assert.throws(() => service.resolveProject('work'), ProjectNotFoundError);
    });

    it('rebuilds a project index from its files', async () => {
      await service.writeEntity({ title: 'Coffee', content: '- relates_to [[Tea]]' });
      await service.writeEntity({ title: 'Tea', content: 'Leaves' });
      const scan = await service.resetProject('main', { reindex: true });
      assert.strictEqual(scan.created, 2);
      assert.deepStrictEqual(store.stats(project.id), { entities: 2, observations: 0, relations: 1, danglingRelations: 0 });
    });

    it('resets without reindexing', async () => {
      await service.writeEntity({ title: 'Coffee', content: 'Body' });
      const scan = await service.resetProject('main');
      assert.deepStrictEqual([scan.created, scan.modified, scan.deleted], [0, 0, 0]);
    });
  });
});
