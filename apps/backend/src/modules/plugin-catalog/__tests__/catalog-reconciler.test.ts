/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IPluginCatalogStore, IPluginDescriptor } from '@plugcat/types';
import { CatalogReconciler, descriptorsMatch } from '../services/catalog-reconciler.js';
import type { IParsedPlugin } from '../services/catalog-reconciler.js';
import { ConflictError, NotFoundError } from '../../../lib/errors.js';
import { createMockLogger, loggedMessages } from '../../../tests/vitest/mocks/logger.js';
import type { IMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { descriptor } from './fixtures.js';

/**
 * Store double recording every call; writes succeed unless overridden.
 */
function createMockStore() {
    return {
        listAll: vi.fn<IPluginCatalogStore['listAll']>().mockResolvedValue([]),
        find: vi.fn<IPluginCatalogStore['find']>(),
        create: vi.fn<IPluginCatalogStore['create']>().mockResolvedValue(undefined),
        update: vi.fn<IPluginCatalogStore['update']>().mockResolvedValue(undefined)
    };
}

const parsed = (...descriptors: IPluginDescriptor[]): IParsedPlugin[] =>
    descriptors.map(item => ({ entryName: `plugins/${item.uid}/plugin.yaml`, descriptor: item }));

describe('descriptorsMatch', () => {
    it('should match identical descriptors', () => {
        expect(descriptorsMatch(descriptor(), descriptor())).toBe(true);
    });

    it.each([
        ['type', { type: 'stage' as const }],
        ['description', { description: 'Something else' }],
        ['spec', { spec: 'kind: plugin\n' }],
        ['logo', { logo: '<svg/>' }]
    ])('should not match when %s differs', (_field, overrides) => {
        expect(descriptorsMatch(descriptor(), descriptor(overrides))).toBe(false);
    });

    it('should compare text exactly', () => {
        expect(descriptorsMatch(descriptor(), descriptor({ description: 'Build and push a Docker image ' }))).toBe(false);
    });
});

describe('CatalogReconciler', () => {
    let store: ReturnType<typeof createMockStore>;
    let logger: IMockLogger;
    let reconciler: CatalogReconciler;

    beforeEach(() => {
        store = createMockStore();
        logger = createMockLogger();
        reconciler = new CatalogReconciler(store, logger);
    });

    it('should create descriptors with unknown identifiers', async () => {
        const docker = descriptor();

        const result = await reconciler.reconcile([], parsed(docker));

        expect(result).toEqual({ created: 1, updated: 0, unchanged: 0, failed: 0 });
        expect(store.create).toHaveBeenCalledTimes(1);
        expect(store.create).toHaveBeenCalledWith(docker, {});
        expect(store.update).not.toHaveBeenCalled();
    });

    it('should leave unchanged descriptors alone', async () => {
        const result = await reconciler.reconcile([descriptor()], parsed(descriptor()));

        expect(result).toEqual({ created: 0, updated: 0, unchanged: 1, failed: 0 });
        expect(store.create).not.toHaveBeenCalled();
        expect(store.update).not.toHaveBeenCalled();
    });

    it('should update descriptors whose content changed', async () => {
        const changed = descriptor({ description: 'Build, tag and push a Docker image' });

        const result = await reconciler.reconcile([descriptor()], parsed(changed));

        expect(result).toEqual({ created: 0, updated: 1, unchanged: 0, failed: 0 });
        expect(store.update).toHaveBeenCalledTimes(1);
        expect(store.update).toHaveBeenCalledWith(changed, {});
        expect(loggedMessages(logger.info)).toContain('detected changes: updated existing plugin entry');
    });

    it('should forward the store context to writes', async () => {
        const controller = new AbortController();

        await reconciler.reconcile([], parsed(descriptor()), { signal: controller.signal });

        expect(store.create).toHaveBeenCalledWith(descriptor(), { signal: controller.signal });
    });

    /**
     * Test: Failed writes are logged and counted, later descriptors still run.
     */
    it('should continue after failed writes', async () => {
        store.create.mockRejectedValueOnce(new ConflictError('Plugin "docker" already exists'));
        store.update.mockRejectedValueOnce(new NotFoundError('Plugin "slack" not found'));

        const result = await reconciler.reconcile(
            [descriptor({ uid: 'slack' })],
            parsed(
                descriptor(),
                descriptor({ uid: 'slack', description: 'Notify a channel' }),
                descriptor({ uid: 'deploy', type: 'stage' })
            )
        );

        expect(result).toEqual({ created: 1, updated: 0, unchanged: 0, failed: 2 });
        expect(logger.warn).toHaveBeenCalledWith(
            expect.objectContaining({ name: 'plugins/docker/plugin.yaml', uid: 'docker' }),
            'could not create plugin in DB'
        );
        expect(logger.warn).toHaveBeenCalledWith(
            expect.objectContaining({ name: 'plugins/slack/plugin.yaml', uid: 'slack' }),
            'could not update plugin'
        );
        expect(store.create).toHaveBeenLastCalledWith(descriptor({ uid: 'deploy', type: 'stage' }), {});
    });

    /**
     * Test: A repeated identifier compares against the descriptor just written.
     */
    it('should compare repeated identifiers against the last write', async () => {
        const first = descriptor();
        const second = descriptor({ description: 'Second copy' });

        const result = await reconciler.reconcile([], parsed(first, second, second));

        expect(result).toEqual({ created: 1, updated: 1, unchanged: 1, failed: 0 });
        expect(store.create).toHaveBeenCalledWith(first, {});
        expect(store.update).toHaveBeenCalledWith(second, {});
    });

    it('should retry a create for a repeated identifier whose first create failed', async () => {
        store.create.mockRejectedValueOnce(new Error('socket closed'));

        const result = await reconciler.reconcile([], parsed(descriptor(), descriptor()));

        expect(result).toEqual({ created: 1, updated: 0, unchanged: 0, failed: 1 });
        expect(store.create).toHaveBeenCalledTimes(2);
    });

    it('should log the number of created entries', async () => {
        await reconciler.reconcile([descriptor({ uid: 'slack' })], parsed(descriptor(), descriptor({ uid: 'deploy' })));

        expect(logger.info).toHaveBeenLastCalledWith({ created: 2, updated: 0 }, 'added 2 new entries to plugins');
    });

    it('should accept a lazy iterable', async () => {
        function* lazy(): Generator<IParsedPlugin> {
            yield { entryName: 'plugins/docker/plugin.yaml', descriptor: descriptor() };
        }

        const result = await reconciler.reconcile([], lazy());

        expect(result.created).toBe(1);
    });
});
