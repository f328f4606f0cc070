/**
 * Log levels accepted by the log plugins, most severe first. They are the npm levels winston uses.
 */
export enum ELogLevel {
    error = "error",
    warn = "warn",
    info = "info",
    verbose = "verbose",
    debug = "debug",
    silly = "silly"
}
