import * as Winston from "winston";
import _ = require("lodash");
import async = require("async");
import TransportStream = require("winston-transport");
import {ILogPluginParams} from "../../public/options/logging/ILogPluginParams";
import {ELogLevel} from "../../public/options/logging/ELogLevel";
import {LogFormatUtil} from "../../public/utils/LogFormatUtil";
import {ErrorUtil} from "../../public/utils/ErrorUtil";
import {IConsoleLogOptions} from "./IConsoleLogOptions";

export function consoleLogger(
    params: ILogPluginParams, result: async.AsyncResultCallback<TransportStream[], Error>): void {

    let transports: TransportStream[];
    try {
        const items: Array<object> = _.isArray(params.options) ? params.options : [params.options];

        transports = _.map(items, (item: object) => {
            const colorize: unknown = Reflect.get(item, "colorize");
            const opt: IConsoleLogOptions = _.assign(LogFormatUtil.readCommonOptions(item), {
                colorize: _.isBoolean(colorize) ? colorize : true
            });

            return new Winston.transports.Console({
                level: opt.level || ELogLevel.info,
                stderrLevels: _.values(ELogLevel),
                format: LogFormatUtil.create(opt, params.label, opt.colorize !== false)
            });
        });
    } catch (e) {
        result(ErrorUtil.toError(e));
        return;
    }

    result(null, transports);
}
