/**
 * Entity contracts shared by every persistence-backed service
 */

export interface Entity {
    id: number;
}

/**
 * Capability surface every entity service must provide.
 *
 * `get`, `update` and `delete` reject with an EntityNotFoundError when the
 * identity is unknown. `getAll` resolves to an empty array on an empty store.
 */
export interface EntityService<T extends Entity> {
    add(entity: T): Promise<T>;
    update(entity: T): Promise<T>;
    get(id: number): Promise<T>;
    getAll(): Promise<T[]>;
    delete(entity: T): Promise<void>;
}
