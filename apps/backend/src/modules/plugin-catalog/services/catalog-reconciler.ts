import type { ILogger, IPluginCatalogStore, IPluginDescriptor, IStoreContext } from '@plugcat/types';

/**
 * A descriptor paired with the archive entry it was parsed from.
 */
export interface IParsedPlugin {
    entryName: string;
    descriptor: IPluginDescriptor;
}

export interface IReconcileResult {
    created: number;
    updated: number;
    unchanged: number;
    failed: number;
}

/**
 * Content identity: two descriptors match when every field is exactly equal.
 */
export function descriptorsMatch(a: IPluginDescriptor, b: IPluginDescriptor): boolean {
    return (
        a.uid === b.uid &&
        a.type === b.type &&
        a.description === b.description &&
        a.spec === b.spec &&
        a.logo === b.logo
    );
}

/**
 * Diffs parsed descriptors against a snapshot of the catalog and applies the
 * minimal set of creates and updates.
 *
 * Store failures on individual descriptors are logged and counted; they never
 * abort the remaining work.
 */
export class CatalogReconciler {
    constructor(
        private readonly store: IPluginCatalogStore,
        private readonly logger: ILogger
    ) {}

    /**
     * @param existing - Catalog snapshot taken before the pass
     * @param parsed - Descriptors in archive traversal order
     * @param context - Forwarded to every store write
     */
    async reconcile(
        existing: readonly IPluginDescriptor[],
        parsed: Iterable<IParsedPlugin>,
        context: IStoreContext = {}
    ): Promise<IReconcileResult> {
        const index = new Map<string, IPluginDescriptor>();
        for (const descriptor of existing) {
            index.set(descriptor.uid, descriptor);
        }

        const result: IReconcileResult = { created: 0, updated: 0, unchanged: 0, failed: 0 };

        for (const { entryName, descriptor } of parsed) {
            const current = index.get(descriptor.uid);

            if (current && descriptorsMatch(current, descriptor)) {
                this.logger.debug({ name: entryName, uid: descriptor.uid }, 'plugin unchanged');
                result.unchanged++;
                continue;
            }

            if (current) {
                try {
                    await this.store.update(descriptor, context);
                } catch (error) {
                    this.logger.warn({ error, name: entryName, uid: descriptor.uid }, 'could not update plugin');
                    result.failed++;
                    continue;
                }
                this.logger.info({ name: entryName, uid: descriptor.uid }, 'detected changes: updated existing plugin entry');
                result.updated++;
            } else {
                try {
                    await this.store.create(descriptor, context);
                } catch (error) {
                    this.logger.warn({ error, name: entryName, uid: descriptor.uid }, 'could not create plugin in DB');
                    result.failed++;
                    continue;
                }
                result.created++;
            }

            index.set(descriptor.uid, descriptor);
        }

        this.logger.info({ created: result.created, updated: result.updated }, `added ${result.created} new entries to plugins`);
        return result;
    }
}
