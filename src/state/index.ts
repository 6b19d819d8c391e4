/**
 * State Store
 *
 * Durable record of which episode identifiers have been fully processed.
 * Created once at start-up and passed explicitly to the selector and
 * processor.
 */

import * as Store from './store';

export type StateStore = Store.StoreInstance;

export const create = async (filePath: string): Promise<StateStore> => {
    const store = Store.create(filePath);
    await store.load();
    return store;
};
