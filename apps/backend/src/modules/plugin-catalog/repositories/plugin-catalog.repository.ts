import { MongoServerError } from 'mongodb';
import type { Collection, WithId } from 'mongodb';
import type { IDatabaseService, IPluginCatalogStore, IPluginDescriptor, IStoreContext } from '@plugcat/types';
import type { IPluginDocument } from '../database/index.js';
import { ConflictError, NotFoundError } from '../../../lib/errors.js';

const DUPLICATE_KEY_ERROR = 11000;

/**
 * MongoDB-backed plugin catalog store.
 *
 * Implements the four catalog operations the synchronization pass and the lookup
 * path rely on. Identifiers are unique (enforced by index and checked before
 * insert); a version argument is accepted on find but every identifier has a
 * single live manifest, so lookups resolve by identifier alone.
 */
export class PluginCatalogRepository implements IPluginCatalogStore {
    public static readonly COLLECTION = 'plugins';

    private readonly collection: Collection<IPluginDocument>;

    /**
     * @param database - Database service providing the `plugins` collection
     */
    constructor(private readonly database: IDatabaseService) {
        this.collection = database.getCollection<IPluginDocument>(PluginCatalogRepository.COLLECTION);
    }

    /**
     * Create the unique identifier index. Safe to call on every startup.
     */
    async createIndexes(): Promise<void> {
        await this.database.createIndex(PluginCatalogRepository.COLLECTION, { uid: 1 }, { unique: true });
    }

    async listAll(context: IStoreContext = {}): Promise<IPluginDescriptor[]> {
        context.signal?.throwIfAborted();
        const documents = await this.collection.find({}).toArray();
        return documents.map(document => this.toDescriptor(document));
    }

    async find(uid: string, version: string, context: IStoreContext = {}): Promise<IPluginDescriptor> {
        context.signal?.throwIfAborted();
        const document = await this.collection.findOne({ uid });
        if (!document) {
            throw new NotFoundError(`Plugin "${uid}" not found`, { uid, version });
        }
        return this.toDescriptor(document);
    }

    /**
     * Insert a new catalog entry.
     *
     * @throws ConflictError if the identifier exists, including when a concurrent
     * pass inserted it between the existence check and the insert
     */
    async create(descriptor: IPluginDescriptor, context: IStoreContext = {}): Promise<void> {
        context.signal?.throwIfAborted();
        const existing = await this.collection.findOne({ uid: descriptor.uid });
        if (existing) {
            throw new ConflictError(`Plugin "${descriptor.uid}" already exists`, { uid: descriptor.uid });
        }

        const now = new Date();
        try {
            await this.collection.insertOne({
                uid: descriptor.uid,
                type: descriptor.type,
                description: descriptor.description,
                spec: descriptor.spec,
                logo: descriptor.logo,
                version: '',
                createdAt: now,
                updatedAt: now
            });
        } catch (error) {
            if (error instanceof MongoServerError && error.code === DUPLICATE_KEY_ERROR) {
                throw new ConflictError(`Plugin "${descriptor.uid}" already exists`, { uid: descriptor.uid }, { cause: error });
            }
            throw error;
        }
    }

    /**
     * Overwrite the content identity of an existing entry.
     *
     * @throws NotFoundError if no entry has the identifier
     */
    async update(descriptor: IPluginDescriptor, context: IStoreContext = {}): Promise<void> {
        context.signal?.throwIfAborted();
        const result = await this.collection.updateOne(
            { uid: descriptor.uid },
            {
                $set: {
                    type: descriptor.type,
                    description: descriptor.description,
                    spec: descriptor.spec,
                    logo: descriptor.logo,
                    updatedAt: new Date()
                }
            }
        );

        if (result.matchedCount === 0) {
            throw new NotFoundError(`Plugin "${descriptor.uid}" not found`, { uid: descriptor.uid });
        }
    }

    private toDescriptor(document: WithId<IPluginDocument>): IPluginDescriptor {
        return {
            uid: document.uid,
            type: document.type,
            description: document.description,
            spec: document.spec,
            logo: document.logo
        };
    }
}
