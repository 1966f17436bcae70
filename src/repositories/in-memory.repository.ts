import type {Entity, EntityService} from '../interfaces/entity.interface';
import {EntityNotFoundError} from '../utils/errors.util';
import {logger} from '../utils/logger.util';

/**
 * Process-local entity store. Hands out copies so callers never share state with the store.
 */
export class InMemoryRepository<T extends Entity> implements EntityService<T> {
    private readonly records = new Map<number, T>();
    private sequence = 0;

    constructor(private readonly entityName: string) {}

    async add(entity: T): Promise<T> {
        const id = ++this.sequence;
        const stored = {...entity, id};
        this.records.set(id, stored);

        logger.debug(`Created ${this.entityName}:`, id);
        return {...stored};
    }

    async update(entity: T): Promise<T> {
        if (!this.records.has(entity.id)) {
            throw new EntityNotFoundError(this.entityName, entity.id);
        }

        const stored = {...entity};
        this.records.set(entity.id, stored);

        logger.debug(`Updated ${this.entityName}:`, entity.id);
        return {...stored};
    }

    async get(id: number): Promise<T> {
        const stored = this.records.get(id);
        if (!stored) {
            throw new EntityNotFoundError(this.entityName, id);
        }
        return {...stored};
    }

    async getAll(): Promise<T[]> {
        return Array.from(this.records.values())
            .sort((a, b) => a.id - b.id)
            .map(record => ({...record}));
    }

    async delete(entity: T): Promise<void> {
        if (!this.records.delete(entity.id)) {
            throw new EntityNotFoundError(this.entityName, entity.id);
        }
        logger.debug(`Deleted ${this.entityName}:`, entity.id);
    }

    /**
     * Remove every record and restart identities at 1
     */
    clear(): void {
        this.records.clear();
        this.sequence = 0;
    }
}
