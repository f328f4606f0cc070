import _ = require("lodash");
import {IJobSpec} from "../public/model/IJobSpec";
import {IBuildJobSpec} from "../public/model/IBuildJobSpec";
import {IDeployJobSpec} from "../public/model/IDeployJobSpec";
import {IGitRemote} from "../public/model/IGitRemote";
import {IRetentionPolicy} from "../public/model/IRetentionPolicy";
import {EJobType} from "../public/model/EJobType";
import {IPullRequestDiscovery} from "../public/model/ISourceTraits";
import {IBuildStrategies} from "../public/model/IBuildStrategies";
import {
    ORPHANED_ITEM_DAYS_TO_KEEP,
    ORPHANED_ITEMS_TO_KEEP,
    TAG_MAX_AGE_DAYS
} from "../plugins/jobseed-multibranch-pipeline/internal/BuildJobSpecFactory";
import {
    APPLICATION_REMOTE,
    BUILD_LOG_DAYS_TO_KEEP,
    BUILD_LOGS_TO_KEEP,
    DEPLOY_BRANCH,
    INFRASTRUCTURE_REMOTE
} from "../plugins/jobseed-pipeline/internal/DeployJobSpecFactory";

/**
 * Checks the invariants every emitted job must hold. Returns one message per violation, empty when the spec is valid.
 */
export function validateJobSpec(spec: IJobSpec): string[] {
    const problems: string[] = [];
    if (isBlank(spec.name)) {
        problems.push("The job name is blank.");
    }

    switch (spec.type) {
        case EJobType.multibranchPipeline:
            validateBuildJob(spec, problems);
            break;
        case EJobType.pipeline:
            validateDeployJob(spec, problems);
            break;
    }

    return problems;
}

/**
 * Throws an error listing every violated invariant.
 */
export function assertValidJobSpec(spec: IJobSpec): void {
    const problems: string[] = validateJobSpec(spec);
    if (problems.length > 0) {
        throw new Error("Job " + spec.name + " is invalid:\n - " + problems.join("\n - "));
    }
}

function validateBuildJob(spec: IBuildJobSpec, problems: string[]): void {
    const checks: _.Dictionary<string> = {
        "source owner": spec.source.owner,
        "source repository": spec.source.repository,
        "source repository URL": spec.source.repositoryUrl,
        "API credentials": spec.source.credentialsId,
        "SSH checkout credentials": spec.traits.sshCheckout.credentialsId,
        "script path": spec.scriptPath
    };
    _.forEach(checks, (value: string, what: string) => {
        if (isBlank(value)) {
            problems.push("The " + what + " is blank.");
        }
    });

    const prDiscovery: IPullRequestDiscovery = spec.traits.pullRequestDiscovery;
    if (!spec.traits.tagDiscovery || !prDiscovery.originOnly) {
        problems.push("Tag discovery and origin-only pull request discovery must both be enabled.");
    }

    const changeRequests: IBuildStrategies["changeRequests"] = spec.buildStrategies.changeRequests;
    if (changeRequests.ignoreTargetOnlyChanges !== true || changeRequests.ignoreUntrustedChanges !== false) {
        problems.push("Change requests must ignore target-only changes and build untrusted changes.");
    }

    if (spec.buildStrategies.tags.atMostDays !== TAG_MAX_AGE_DAYS) {
        problems.push("Tags must be built up to " + TAG_MAX_AGE_DAYS + " days old, found " +
            spec.buildStrategies.tags.atMostDays + ".");
    }

    checkRetention("Orphaned item retention", spec.orphanedItemStrategy,
        ORPHANED_ITEMS_TO_KEEP, ORPHANED_ITEM_DAYS_TO_KEEP, problems);
}

function validateDeployJob(spec: IDeployJobSpec, problems: string[]): void {
    if (!spec.disableConcurrentBuilds) {
        problems.push("Concurrent builds must be disabled.");
    }

    checkRetention("Log retention", spec.logRotator, BUILD_LOGS_TO_KEEP, BUILD_LOG_DAYS_TO_KEEP, problems);

    const names: string[] = _.map(spec.remotes, (remote: IGitRemote) => remote.name);
    const expected: string[] = [APPLICATION_REMOTE, INFRASTRUCTURE_REMOTE];
    if (!_.isEqual(names, expected)) {
        problems.push("The remotes must be " + expected.join(", ") + " in that order, found " +
            (names.length > 0 ? names.join(", ") : "none") + ".");
    }

    _.forEach(spec.remotes, (remote: IGitRemote) => {
        if (isBlank(remote.url)) {
            problems.push("The URL of remote " + remote.name + " is blank.");
        }
        if (isBlank(remote.credentialsId)) {
            problems.push("The credentials of remote " + remote.name + " are blank.");
        }
    });

    if (spec.branch !== DEPLOY_BRANCH) {
        problems.push("The branch must be " + DEPLOY_BRANCH + ", found " + spec.branch + ".");
    }

    if (isBlank(spec.scriptPath)) {
        problems.push("The script path is blank.");
    }
}

function checkRetention(
    what: string, policy: IRetentionPolicy, numToKeep: number, daysToKeep: number, problems: string[]): void {
    if (policy.numToKeep !== numToKeep || policy.daysToKeep !== daysToKeep) {
        problems.push(what + " must keep " + numToKeep + " items for " + daysToKeep + " days, found " +
            policy.numToKeep + " items for " + policy.daysToKeep + " days.");
    }
}

function isBlank(value: string | null | undefined): boolean {
    return _.trim(value || "").length === 0;
}
