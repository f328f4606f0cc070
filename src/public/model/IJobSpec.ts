import {IBuildJobSpec} from "./IBuildJobSpec";
import {IDeployJobSpec} from "./IDeployJobSpec";

export type IJobSpec = IBuildJobSpec | IDeployJobSpec;

/**
 * What gets written out in JSON format.
 */
export interface ISeedDescriptor {
    readonly jobs: ReadonlyArray<IJobSpec>;
}
