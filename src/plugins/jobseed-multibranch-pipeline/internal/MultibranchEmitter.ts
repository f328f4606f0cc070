import {IBuildJobSpec} from "../../../public/model/IBuildJobSpec";
import {DslWriter} from "../../../public/dsl/DslWriter";
import {IBuildStrategies} from "../../../public/model/IBuildStrategies";
import {ISourceTraits} from "../../../public/model/ISourceTraits";

const BRANCH_SOURCE_CLASS: string = "jenkins.branch.BranchSource";
const ORIGIN_PR_DISCOVERY_TRAIT_CLASS: string =
    "org.jenkinsci.plugins.github_branch_source.OriginPullRequestDiscoveryTrait";

/**
 * Writes a `multibranchPipelineJob`.
 *
 * The Job DSL has no method for origin-only pull request discovery, so the trait is appended to the generated XML
 * with a `configure` block.
 */
export function emitBuildJob(spec: IBuildJobSpec, writer: DslWriter): void {
    writer.callBlock("multibranchPipelineJob", [spec.name], (job: DslWriter) => {
        job.block("branchSources", (branchSources: DslWriter) =>
            branchSources.block("branchSource", (branchSource: DslWriter) => {
                emitBuildStrategies(spec, branchSource);
                branchSource.block("source", (source: DslWriter) =>
                    source.block("github", (github: DslWriter) => emitGitHubSource(spec, github)));
            }));

        job.block("orphanedItemStrategy", (strategy: DslWriter) =>
            strategy.block("discardOldItems", (discard: DslWriter) => discard
                .call("numToKeep", spec.orphanedItemStrategy.numToKeep)
                .call("daysToKeep", spec.orphanedItemStrategy.daysToKeep)));

        job.block("factory", (factory: DslWriter) =>
            factory.block("workflowBranchProjectFactory", (projectFactory: DslWriter) =>
                projectFactory.call("scriptPath", spec.scriptPath)));

        if (spec.traits.pullRequestDiscovery.originOnly) {
            job.block("configure", (configure: DslWriter) => configure
                .statement("def traits = it / sources / data / " + DslWriter.literal(BRANCH_SOURCE_CLASS) +
                    " / source / traits")
                .rawBlock("traits << " + DslWriter.literal(ORIGIN_PR_DISCOVERY_TRAIT_CLASS), (trait: DslWriter) =>
                    trait.call("strategyId", spec.traits.pullRequestDiscovery.strategyId)));
        }
    });
}

function emitBuildStrategies(spec: IBuildJobSpec, writer: DslWriter): void {
    const strategies: IBuildStrategies = spec.buildStrategies;

    writer.block("buildStrategies", (buildStrategies: DslWriter) => {
        buildStrategies.block("buildChangeRequests", (changeRequests: DslWriter) => changeRequests
            .call("ignoreTargetOnlyChanges", strategies.changeRequests.ignoreTargetOnlyChanges)
            .call("ignoreUntrustedChanges", strategies.changeRequests.ignoreUntrustedChanges));

        // the tag strategy takes its day counts as strings
        buildStrategies.block("buildTags", (tags: DslWriter) => tags
            .call("atMostDays", daysAsString(strategies.tags.atMostDays))
            .call("atLeastDays", daysAsString(strategies.tags.atLeastDays)));
    });
}

function emitGitHubSource(spec: IBuildJobSpec, writer: DslWriter): void {
    const traits: ISourceTraits = spec.traits;

    writer
        .call("id", spec.source.id)
        .call("credentialsId", spec.source.credentialsId)
        .call("repoOwner", spec.source.owner)
        .call("repository", spec.source.repository)
        .call("repositoryUrl", spec.source.repositoryUrl)
        .call("configuredByUrl", spec.source.configuredByUrl)
        .block("traits", (traitsWriter: DslWriter) => {
            if (traits.tagDiscovery) {
                traitsWriter.call("gitHubTagDiscovery");
            }

            if (traits.ignoreDraftPullRequests) {
                traitsWriter.call("ignoreDraftPullRequestFilterTrait");
            }

            traitsWriter.block("gitHubSshCheckout", (ssh: DslWriter) =>
                ssh.call("credentialsId", traits.sshCheckout.credentialsId));

            traitsWriter.block("submoduleOptionTrait", (submoduleOption: DslWriter) =>
                submoduleOption.block("extension", (extension: DslWriter) => extension
                    .call("disableSubmodules", traits.submodules.disableSubmodules)
                    .call("recursiveSubmodules", traits.submodules.recursiveSubmodules)
                    .call("trackingSubmodules", traits.submodules.trackingSubmodules)
                    .call("reference", traits.submodules.reference)
                    .call("timeout", traits.submodules.timeout)
                    .call("parentCredentials", traits.submodules.parentCredentials)));
        });
}

function daysAsString(days: number | null): string | null {
    return days === null ? null : String(days);
}
