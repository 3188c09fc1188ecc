/**
 * Counters reported by one catalog synchronization pass.
 */
export interface IPluginSyncResult {
    /**
     * Descriptors with a new identifier that were created. This is the pass's
     * "added" total; updates never count toward it.
     */
    created: number;

    /**
     * Existing descriptors whose content identity changed and were updated.
     */
    updated: number;

    /**
     * Existing descriptors left untouched because nothing changed.
     */
    unchanged: number;

    /**
     * Matching archive entries dropped before reconciliation (unreadable,
     * unparsable, or not a step/stage plugin manifest).
     */
    skipped: number;

    /**
     * Descriptors whose create or update call failed.
     */
    failed: number;
}
