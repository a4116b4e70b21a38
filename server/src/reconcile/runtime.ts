import { v4 as uuidv4 } from 'uuid';

/** Clock and id source, injectable so runs can be replayed deterministically. */
export interface Runtime {
    now: () => string;
    newId: () => string;
}

export const systemRuntime: Runtime = {
    now: () => new Date().toISOString(),
    newId: () => uuidv4(),
};
