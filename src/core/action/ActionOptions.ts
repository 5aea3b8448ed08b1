import { type FieldSchema } from '../types.js';

/** Metadata and hooks shared by {@link SyncAction} and {@link AsyncAction}. */
export interface ActionOptions {
    /** Human-readable summary, listed by registries */
    readonly description?: string;
    /** Capability tags used by {@link filterActions} */
    readonly tags?: readonly string[];
    /** Zod schema the dispatcher parses fields with before invoking */
    readonly schema?: FieldSchema;
    /** Runs when the owning registry removes the action */
    readonly onDispose?: () => void;
}
