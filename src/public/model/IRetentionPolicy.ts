/**
 * How many items (jobs, builds) Jenkins keeps around, and for how long.
 */
export interface IRetentionPolicy {
    readonly numToKeep: number;
    readonly daysToKeep: number;
}
