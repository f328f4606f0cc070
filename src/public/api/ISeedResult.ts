import {EOutputFormat} from "../options/EOutputFormat";

/**
 * What a run produced.
 */
export interface ISeedResult {
    format: EOutputFormat;

    /**
     * The names of the emitted jobs, in order.
     */
    jobs: string[];

    /**
     * The emitted seed.
     */
    output: string;

    /**
     * The absolute path the seed was written to, or null when it was only returned.
     */
    path: string | null;
}
