/**
 * The kinds of Jenkins jobs jobseed knows how to describe. The values double as the `job:<type>` plugin keys.
 */
export enum EJobType {
    multibranchPipeline = "multibranch-pipeline",
    pipeline = "pipeline"
}
