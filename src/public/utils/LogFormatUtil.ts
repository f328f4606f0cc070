import _ = require("lodash");
import * as Winston from "winston";
import {ELogLevel} from "../options/logging/ELogLevel";
import {ELogOutputFormat} from "../options/logging/ELogOutputFormat";
import {ICommonLogOptions} from "../options/logging/ICommonLogOptions";

export class LogFormatUtil {

    static isLogLevel(value: unknown): value is ELogLevel {
        return _.some(_.values(ELogLevel), (level: string) => level === value);
    }

    static isOutputFormat(value: unknown): value is ELogOutputFormat {
        return _.some(_.values(ELogOutputFormat), (format: string) => format === value);
    }

    /**
     * Picks the common log options out of what the manifest supplied. Unknown levels and formats are errors.
     *
     * @param {object} raw
     * @returns {ICommonLogOptions}
     */
    static readCommonOptions(raw: object): ICommonLogOptions {
        const level: unknown = Reflect.get(raw, "level");
        const format: unknown = Reflect.get(raw, "format");
        const prettyPrint: unknown = Reflect.get(raw, "prettyPrint");
        const timestamp: unknown = Reflect.get(raw, "timestamp");

        if (!_.isNil(level) && !LogFormatUtil.isLogLevel(level)) {
            throw new Error("Unknown log level " + String(level) + ". Use one of " +
                _.values(ELogLevel).join(", ") + ".");
        }

        if (!_.isNil(format) && !LogFormatUtil.isOutputFormat(format)) {
            throw new Error("Unknown log format " + String(format) + ". Use one of " +
                _.values(ELogOutputFormat).join(", ") + ".");
        }

        return {
            level: LogFormatUtil.isLogLevel(level) ? level : undefined,
            format: LogFormatUtil.isOutputFormat(format) ? format : undefined,
            prettyPrint: _.isBoolean(prettyPrint) ? prettyPrint : undefined,
            timestamp: _.isBoolean(timestamp) ? timestamp : undefined
        };
    }

    /**
     * Every line carries the label of the run.
     */
    static create(options: ICommonLogOptions, label: string, colorize: boolean): Winston.Logform.Format {
        const formats: Winston.Logform.Format[] = [Winston.format.label({label: label})];

        if (options.timestamp !== false) {
            formats.push(Winston.format.timestamp());
        }

        switch (options.format) {
            case ELogOutputFormat.json:
                formats.push(options.prettyPrint ? Winston.format.prettyPrint() : Winston.format.json());
                break;
            case ELogOutputFormat.logstash:
                formats.push(Winston.format.logstash());
                break;
            default:
                if (colorize) {
                    formats.push(Winston.format.colorize());
                }
                formats.push(Winston.format.printf((info: Winston.Logform.TransformableInfo) =>
                    _.compact([info.timestamp, "[" + String(info.label) + "]", info.level + ":", String(info.message)]).join(" ")));
        }

        return Winston.format.combine(...formats);
    }
}
