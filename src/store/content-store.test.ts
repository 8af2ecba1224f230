import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ContentStore } from './content-store.js';
import { StoreError, type StoreErrorCode } from './errors.js';
import { getRecordSetPath } from '../storage/paths.js';

const BUILD_1 = '20260301-100000-aaaa';
const BUILD_2 = '20260302-100000-bbbb';

async function expectStoreError(promise: Promise<unknown>, code: StoreErrorCode): Promise<StoreError> {
  try {
    await promise;
  } catch (error) {
    expect(error).toBeInstanceOf(StoreError);
    if (error instanceof StoreError) {
      expect(error.code).toBe(code);
      return error;
    }
  }
  throw new Error(`Expected a StoreError (${code})`);
}

describe('ContentStore', () => {
  let tempDir: string;
  let current: Date;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'store-test-'));
    current = new Date('2026-03-01T10:00:00.000Z');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function openStore(buildId: string | null = BUILD_1): Promise<ContentStore> {
    const store = await ContentStore.open(tempDir, { now: () => current });
    if (buildId) {
      store.startBuild(buildId);
    }
    return store;
  }

  function advance(ms: number): void {
    current = new Date(current.getTime() + ms);
  }

  describe('upsert', () => {
    it('requires a build', async () => {
      const store = await openStore(null);
      await expectStoreError(store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs'), 'no-build');
    });

    it('inserts a validated record', async () => {
      const store = await openStore();
      const record = await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');

      expect(record).toEqual({
        variant: 'organization',
        naturalKey: 'acme',
        attributes: { name: 'Acme', isPartner: false },
        sourceStage: 'orgs',
        firstSeenAt: '2026-03-01T10:00:00.000Z',
        lastSeenAt: '2026-03-01T10:00:00.000Z',
        updatedAt: '2026-03-01T10:00:00.000Z',
        lastSeenBuild: BUILD_1,
      });
    });

    it('keeps one record for identical upserts without bumping updatedAt', async () => {
      const store = await openStore();
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');
      advance(60_000);
      const again = await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');

      expect(store.query('organization')).toHaveLength(1);
      expect(again.updatedAt).toBe('2026-03-01T10:00:00.000Z');
      expect(again.lastSeenAt).toBe('2026-03-01T10:01:00.000Z');
    });

    it('bumps updatedAt when attributes change', async () => {
      const store = await openStore();
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');
      advance(60_000);
      const changed = await store.upsert('organization', 'acme', { name: 'Acme Corp' }, 'orgs');

      expect(changed.firstSeenAt).toBe('2026-03-01T10:00:00.000Z');
      expect(changed.updatedAt).toBe('2026-03-01T10:01:00.000Z');
      expect(changed.attributes['name']).toBe('Acme Corp');
    });

    it('rejects unknown variants and invalid attributes', async () => {
      const store = await openStore();

      const unknown = await expectStoreError(store.upsert('widget', 'w1', {}, 'orgs'), 'unknown-variant');
      expect(unknown.message).toBe('Unknown variant "widget"');

      const invalid = await expectStoreError(
        store.upsert('posting', 'p1', { title: 'Engineer', company: 'Acme', url: 'not a url', source: 'feed' }, 'jobs'),
        'invalid-attributes'
      );
      expect(invalid.message).toBe('Invalid posting attributes for "p1": url: Invalid url');
      expect(store.query('posting')).toEqual([]);
    });

    it('rejects a key already written by another stage in this build', async () => {
      const store = await openStore();
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs_a');

      const conflict = await expectStoreError(
        store.upsert('organization', 'acme', { name: 'ACME' }, 'orgs_b'),
        'ownership-conflict'
      );
      expect(conflict.message).toBe(
        'Record organization/acme was already written by "orgs_a" in this build'
      );

      store.startBuild(BUILD_2);
      const next = await store.upsert('organization', 'acme', { name: 'ACME' }, 'orgs_b');
      expect(next.sourceStage).toBe('orgs_b');
    });

    it('enforces declared owners', async () => {
      const store = await openStore();
      store.setOwners(new Map([['organization', 'orgs']]));

      const tx = store.begin('events');
      expect(() => tx.upsert('organization', 'acme', { name: 'Acme' })).toThrow(
        'Stage "events" may not write variant "organization" (owned by "orgs")'
      );
      expect(() => tx.upsert('event', 'meetup', {})).toThrow(
        'Stage "events" may not write variant "event"'
      );

      store.setOwners(null);
      expect(() => tx.upsert('event', 'meetup', { title: 'Meetup', startsAt: '2026-03-10T18:00:00.000Z' })).not.toThrow();
    });
  });

  describe('markSeen', () => {
    it('affirms without changing attributes', async () => {
      const store = await openStore();
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');

      store.startBuild(BUILD_2);
      advance(60_000);
      const seen = await store.markSeen('organization', 'acme');

      expect(seen.lastSeenBuild).toBe(BUILD_2);
      expect(seen.lastSeenAt).toBe('2026-03-01T10:01:00.000Z');
      expect(seen.updatedAt).toBe('2026-03-01T10:00:00.000Z');
      expect(seen.attributes).toEqual({ name: 'Acme', isPartner: false });
    });

    it('fails for a missing record', async () => {
      const store = await openStore();
      await expectStoreError(store.markSeen('organization', 'nobody'), 'not-found');
    });
  });

  describe('transactions', () => {
    it('collapses repeated writes to one key', async () => {
      const store = await openStore();
      const tx = store.begin('orgs');
      tx.upsert('organization', 'acme', { name: 'Acme' });
      tx.upsert('organization', 'acme', { name: 'Acme Corp' });
      tx.markSeen('organization', 'acme');

      expect(tx.size).toBe(1);
      const summary = await tx.commit();

      expect(summary).toMatchObject({ stage: 'orgs', variants: ['organization'], inserted: 1, affirmed: 0 });
      expect(store.get('organization', 'acme')?.attributes['name']).toBe('Acme Corp');
      expect(tx.state).toBe('committed');
    });

    it('commits all or nothing', async () => {
      const store = await openStore();
      const tx = store.begin('orgs');
      tx.upsert('organization', 'acme', { name: 'Acme' });
      tx.markSeen('organization', 'missing');

      await expectStoreError(tx.commit(), 'not-found');
      expect(tx.state).toBe('rolled-back');
      expect(store.query('organization')).toEqual([]);

      const reopened = await openStore();
      expect(reopened.query('organization')).toEqual([]);
    });

    it('refuses writes after commit or rollback', async () => {
      const store = await openStore();
      const tx = store.begin('orgs');
      tx.rollback();

      expect(() => tx.upsert('organization', 'acme', { name: 'Acme' })).toThrow(
        'Transaction for stage "orgs" is already rolled-back'
      );
      await expectStoreError(tx.commit(), 'transaction-closed');
    });

    it('rejects empty natural keys', async () => {
      const store = await openStore();
      expect(() => store.begin('orgs').upsert('organization', '  ', { name: 'Acme' })).toThrow(
        'Empty natural key for organization'
      );
    });

    it('serializes commits to the same variant', async () => {
      const store = await openStore();
      const a = store.begin('orgs_a');
      const b = store.begin('orgs_b');
      a.upsert('organization', 'acme', { name: 'Acme' });
      b.upsert('organization', 'globex', { name: 'Globex' });

      await Promise.all([a.commit(), b.commit()]);

      const reopened = await openStore();
      expect(reopened.query('organization').map((r) => r.naturalKey)).toEqual(['acme', 'globex']);
    });

    it('fingerprints what was written', async () => {
      const store = await openStore();
      const write = async (name: string) => {
        const tx = store.begin('orgs');
        tx.upsert('organization', 'acme', { name });
        return (await tx.commit()).outputFingerprint;
      };

      const first = await write('Acme');
      expect(first).toMatch(/^[a-f0-9]{64}$/);
      expect(await write('Acme')).toBe(first);
      expect(await write('Acme Corp')).not.toBe(first);
    });
  });

  describe('pruneUnseen', () => {
    it('removes records not affirmed in the current build', async () => {
      const store = await openStore();
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');
      await store.upsert('organization', 'globex', { name: 'Globex' }, 'orgs');

      store.startBuild(BUILD_2);
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');

      expect(await store.pruneUnseen('organization')).toEqual(['globex']);
      const reopened = await openStore();
      expect(reopened.query('organization').map((r) => r.naturalKey)).toEqual(['acme']);
    });

    it('requires a build', async () => {
      const store = await openStore(null);
      await expectStoreError(store.pruneUnseen('organization'), 'no-build');
    });
  });

  describe('reads', () => {
    it('filters, sorts and copies query results', async () => {
      const store = await openStore();
      await store.upsert('organization', 'globex', { name: 'Globex', isPartner: true }, 'orgs');
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');
      await store.upsert('organization', 'initech', { name: 'Initech', isPartner: true }, 'orgs');

      const partners = store.query('organization', (r) => r.attributes['isPartner'] === true);
      expect(partners.map((r) => r.naturalKey)).toEqual(['globex', 'initech']);

      const first = store.query('organization')[0];
      if (first) {
        first.naturalKey = 'mutated';
      }
      expect(store.query('organization')[0]?.naturalKey).toBe('acme');
    });

    it('reports per-variant status', async () => {
      const store = await openStore();
      store.setOwners(new Map([['organization', 'orgs']]));
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');
      await store.setPartialFailure('member', true);

      const status = store.status();
      expect(status.map((s) => s.variant)).toEqual([
        'organization',
        'posting',
        'event',
        'member',
        'subscription',
        'feed_entry',
      ]);
      expect(status[0]).toEqual({
        variant: 'organization',
        count: 1,
        owner: 'orgs',
        partialFailure: false,
        lastUpdatedAt: '2026-03-01T10:00:00.000Z',
      });
      expect(status[3]).toEqual({
        variant: 'member',
        count: 0,
        owner: null,
        partialFailure: true,
        lastUpdatedAt: null,
      });
    });

    it('exports a snapshot of every variant', async () => {
      const store = await openStore();
      await store.upsert('organization', 'acme', { name: 'Acme' }, 'orgs');

      const snapshot = store.exportSnapshot();
      expect(snapshot.buildId).toBe(BUILD_1);
      expect(snapshot.exportedAt).toBe('2026-03-01T10:00:00.000Z');
      expect(snapshot.variants.organization).toEqual({
        partialFailure: false,
        records: [
          {
            naturalKey: 'acme',
            attributes: { name: 'Acme', isPartner: false },
            sourceStage: 'orgs',
            firstSeenAt: '2026-03-01T10:00:00.000Z',
            updatedAt: '2026-03-01T10:00:00.000Z',
          },
        ],
      });
      expect(snapshot.variants.posting).toEqual({ partialFailure: false, records: [] });
    });
  });

  describe('persistence', () => {
    it('survives a reopen, including the partial flag', async () => {
      const store = await openStore();
      await store.upsert('member', 'u1', { displayName: 'Ada' }, 'members');
      await store.setPartialFailure('member', true);

      const reopened = await openStore(null);
      expect(reopened.get('member', 'u1')?.attributes).toEqual({
        displayName: 'Ada',
        isBot: false,
        roles: [],
      });
      expect(reopened.status().find((s) => s.variant === 'member')?.partialFailure).toBe(true);
    });

    it('migrates version 1 record sets on load', async () => {
      const filePath = getRecordSetPath(tempDir, 'organization');
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(
        filePath,
        JSON.stringify({
          schemaVersion: 1,
          variant: 'organization',
          updatedAt: '2026-01-01T00:00:00.000Z',
          records: [
            {
              variant: 'organization',
              naturalKey: 'acme',
              attributes: { name: 'Acme', isPartner: false },
              sourceStage: 'orgs',
              seenAt: '2026-01-02T00:00:00.000Z',
              updatedAt: '2026-01-01T00:00:00.000Z',
            },
          ],
        })
      );

      const store = await openStore(null);
      expect(store.get('organization', 'acme')).toEqual({
        variant: 'organization',
        naturalKey: 'acme',
        attributes: { name: 'Acme', isPartner: false },
        sourceStage: 'orgs',
        firstSeenAt: '2026-01-01T00:00:00.000Z',
        lastSeenAt: '2026-01-02T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z',
        lastSeenBuild: null,
      });
    });

    it('refuses to open over an invalid record set', async () => {
      const filePath = getRecordSetPath(tempDir, 'event');
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify({ schemaVersion: 2, variant: 'member', records: [] }));

      const error = await expectStoreError(ContentStore.open(tempDir), 'read-failed');
      expect(error.message).toBe(`Invalid record set in ${filePath}`);
    });
  });
});
