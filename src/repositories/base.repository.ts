import {firestore} from 'firebase-admin';
import type {z} from 'zod';
import {databaseConfig} from '../config/database.config';
import type {Entity, EntityService} from '../interfaces/entity.interface';
import {describeError, EntityNotFoundError, isBusinessFault} from '../utils/errors.util';
import {logger} from '../utils/logger.util';

const COUNTERS_COLLECTION = '_counters';

/**
 * A field no two documents may share. Each taken value is reserved as
 * `<collection>/<value>` holding the owner's id, inside the same transaction
 * as the write that takes it.
 */
export interface UniqueConstraint<T> {
    collection: string;
    valueOf(entity: T): string;
    conflict(value: string, ownerId: number): Error;
}

interface Reservation {
    claim: firestore.DocumentReference;
    release?: firestore.DocumentReference;
}

export abstract class BaseFirestoreRepository<T extends Entity> implements EntityService<T> {
    protected readonly collectionName: string;
    protected readonly entityName: string;
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    private readonly uniqueConstraints: readonly UniqueConstraint<T>[];

    protected constructor(
        collectionName: string,
        entityName: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        uniqueConstraints: readonly UniqueConstraint<T>[] = []
    ) {
        this.collectionName = collectionName;
        this.entityName = entityName;
        this.schema = schema;
        this.uniqueConstraints = uniqueConstraints;
    }

    // Resolved lazily so the repository can be built before the database is initialized
    protected get firestore(): firestore.Firestore {
        return databaseConfig.firestore;
    }

    protected get collection(): firestore.CollectionReference {
        return this.firestore.collection(this.collectionName);
    }

    /**
     * Store a new document under the next numeric identity
     */
    async add(entity: T): Promise<T> {
        try {
            const counterRef = this.firestore.collection(COUNTERS_COLLECTION).doc(this.collectionName);

            // Firestore transactions take every read before the first write
            const stored = await this.firestore.runTransaction(async transaction => {
                const counter = await transaction.get(counterRef);
                const current: unknown = counter.get('value');
                const id = (typeof current === 'number' ? current : 0) + 1;
                const candidate = {...entity, id};
                const reservations = await this.reserveUniqueValues(transaction, candidate);

                transaction.set(counterRef, {value: id});
                transaction.set(this.collection.doc(String(id)), this.prepareForStorage(candidate));
                this.commitReservations(transaction, reservations, id);
                return candidate;
            });

            logger.debug(`Created document in ${this.collectionName}:`, stored.id);
            return stored;
        } catch (error) {
            throw this.storageFailure('create', error);
        }
    }

    async update(entity: T): Promise<T> {
        try {
            const docRef = this.collection.doc(String(entity.id));

            await this.firestore.runTransaction(async transaction => {
                const snapshot = await transaction.get(docRef);
                const data = snapshot.data();
                if (!snapshot.exists || !data) {
                    throw new EntityNotFoundError(this.entityName, entity.id);
                }
                const reservations = await this.reserveUniqueValues(transaction, entity, this.transformFromStorage(data));

                transaction.set(docRef, this.prepareForStorage(entity));
                this.commitReservations(transaction, reservations, entity.id);
            });

            logger.debug(`Updated document in ${this.collectionName}:`, entity.id);
            return entity;
        } catch (error) {
            throw this.storageFailure('update', error);
        }
    }

    async get(id: number): Promise<T> {
        try {
            const doc = await this.collection.doc(String(id)).get();
            const data = doc.data();

            if (!doc.exists || !data) {
                throw new EntityNotFoundError(this.entityName, id);
            }

            return this.transformFromStorage(data);
        } catch (error) {
            throw this.storageFailure('find', error);
        }
    }

    async getAll(): Promise<T[]> {
        try {
            const snapshot = await this.collection.orderBy('id', 'asc').get();
            return snapshot.docs.map(doc => this.transformFromStorage(doc.data()));
        } catch (error) {
            throw this.storageFailure('list', error);
        }
    }

    async delete(entity: T): Promise<void> {
        try {
            const docRef = this.collection.doc(String(entity.id));

            await this.firestore.runTransaction(async transaction => {
                const snapshot = await transaction.get(docRef);
                const data = snapshot.data();
                if (!snapshot.exists || !data) {
                    throw new EntityNotFoundError(this.entityName, entity.id);
                }
                const stored = this.transformFromStorage(data);

                transaction.delete(docRef);
                for (const constraint of this.uniqueConstraints) {
                    transaction.delete(this.reservationRef(constraint, constraint.valueOf(stored)));
                }
            });

            logger.debug(`Deleted document from ${this.collectionName}:`, entity.id);
        } catch (error) {
            throw this.storageFailure('delete', error);
        }
    }

    /**
     * Read the reservations `entity` needs and fail when another document holds one.
     * Values unchanged from `previous` need no new reservation.
     */
    private async reserveUniqueValues(
        transaction: firestore.Transaction,
        entity: T,
        previous?: T
    ): Promise<Reservation[]> {
        const reservations: Reservation[] = [];

        for (const constraint of this.uniqueConstraints) {
            const value = constraint.valueOf(entity);
            const previousValue = previous ? constraint.valueOf(previous) : undefined;
            if (value === previousValue) continue;

            const claim = this.reservationRef(constraint, value);
            const holder = await transaction.get(claim);
            const ownerId: unknown = holder.get('id');
            if (holder.exists && ownerId !== entity.id) {
                throw constraint.conflict(value, typeof ownerId === 'number' ? ownerId : 0);
            }

            reservations.push({
                claim,
                ...(previousValue !== undefined && {release: this.reservationRef(constraint, previousValue)}),
            });
        }

        return reservations;
    }

    private commitReservations(transaction: firestore.Transaction, reservations: Reservation[], id: number): void {
        for (const {claim, release} of reservations) {
            transaction.set(claim, {id});
            if (release) {
                transaction.delete(release);
            }
        }
    }

    private reservationRef(constraint: UniqueConstraint<T>, value: string): firestore.DocumentReference {
        return this.firestore.collection(constraint.collection).doc(value);
    }

    /**
     * Transform data before storing in Firestore
     * Override in subclasses for custom transformations
     */
    protected prepareForStorage(entity: T): firestore.DocumentData {
        return Object.fromEntries(
            Object.entries(entity).filter(([, value]) => value !== undefined)
        );
    }

    /**
     * Transform data after retrieving from Firestore
     * Override in subclasses for custom transformations
     */
    protected transformFromStorage(data: firestore.DocumentData): T {
        // Convert Firestore timestamps to ISO strings
        const normalized = Object.fromEntries(
            Object.entries(data).map(([key, value]) => [
                key,
                value instanceof firestore.Timestamp ? value.toDate().toISOString() : value,
            ])
        );

        return this.schema.parse(normalized);
    }

    // Business faults pass through untouched; anything else is wrapped with context
    private storageFailure(operation: string, error: unknown): unknown {
        if (isBusinessFault(error)) {
            return error;
        }
        logger.error(`Error during ${operation} in ${this.collectionName}:`, error);
        return new Error(`Failed to ${operation} ${this.entityName}: ${describeError(error)}`);
    }
}
