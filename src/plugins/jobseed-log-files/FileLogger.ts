import * as Winston from "winston";
import * as path from "path";
import _ = require("lodash");
import async = require("async");
import TransportStream = require("winston-transport");
import {ILogPluginParams} from "../../public/options/logging/ILogPluginParams";
import {ELogLevel} from "../../public/options/logging/ELogLevel";
import {ELogOutputFormat} from "../../public/options/logging/ELogOutputFormat";
import {PathUtils} from "../../public/utils/PathUtils";
import {LogFormatUtil} from "../../public/utils/LogFormatUtil";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {IFileLogOptions} from "./IFileLogOptions";

export const LOGS_FOLDER: string = ".jobseed";
const DEFAULT_MAX_FILESIZE: number = 10 * 1024 * 1024;

export function fileLogger(
    params: ILogPluginParams, result: async.AsyncResultCallback<TransportStream[], Error>): void {

    let transports: TransportStream[];
    try {
        const defaultFilePath: string = path.resolve(
            params.config.workingDir, LOGS_FOLDER, params.config.project.slug + ".log");

        const files: Array<object> = _.isArray(params.options) ? params.options : [params.options];

        transports = _.map(files, (item: object) => {
            const opt: IFileLogOptions = readFileOptions(item);

            return new Winston.transports.File({
                filename: PathUtils.getAsAbsolutePath(opt.path, params.config.workingDir) || defaultFilePath,
                level: opt.level || ELogLevel.info,
                maxsize: opt.maxsize || DEFAULT_MAX_FILESIZE,
                maxFiles: opt.maxFiles || 1,
                zippedArchive: opt.zippedArchive || false,
                format: LogFormatUtil.create(
                    _.defaults({}, opt, {format: ELogOutputFormat.json}), params.label, false)
            });
        });
    } catch (e) {
        result(ErrorUtil.toError(e));
        return;
    }

    result(null, transports);
}

function readFileOptions(item: object): IFileLogOptions {
    const filePath: unknown = Reflect.get(item, "path");
    const maxsize: unknown = Reflect.get(item, "maxsize");
    const maxFiles: unknown = Reflect.get(item, "maxFiles");
    const zippedArchive: unknown = Reflect.get(item, "zippedArchive");

    return _.assign(LogFormatUtil.readCommonOptions(item), {
        path: _.isString(filePath) ? filePath : undefined,
        maxsize: _.isNumber(maxsize) ? maxsize : undefined,
        maxFiles: _.isNumber(maxFiles) ? maxFiles : undefined,
        zippedArchive: _.isBoolean(zippedArchive) ? zippedArchive : undefined
    });
}
