import {ELogLevel} from "./ELogLevel";
import {ELogOutputFormat} from "./ELogOutputFormat";

/**
 * Options every log plugin understands, under `log:<plugin>` in the manifest.
 */
export interface ICommonLogOptions {

    /**
     * Lowest level written. Default: info
     */
    level?: ELogLevel;

    /**
     * Values: simple, json, logstash
     * Default: simple for the console, json for files
     */
    format?: ELogOutputFormat;

    /**
     * Indents json lines. Ignored by the other formats.
     */
    prettyPrint?: boolean;

    /**
     * Prefix every entry with an ISO timestamp. Default: true
     */
    timestamp?: boolean;
}
