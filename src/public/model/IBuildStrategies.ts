/**
 * Rules deciding which discovered heads actually get built.
 */
export interface IBuildStrategies {
    readonly changeRequests: {
        readonly ignoreTargetOnlyChanges: boolean;
        readonly ignoreUntrustedChanges: boolean;
    };

    /**
     * Tags are only built when their age falls within this window. `null` means unbounded.
     */
    readonly tags: {
        readonly atMostDays: number | null;
        readonly atLeastDays: number | null;
    };
}
