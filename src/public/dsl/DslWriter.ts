import _ = require("lodash");

/**
 * Values that can be passed as arguments of a Job DSL method call.
 */
export type DslLiteral = string | number | boolean | null;

/**
 * Writes Groovy Job DSL, one statement per line, nesting closures with a fixed indentation.
 *
 *     new DslWriter()
 *         .callBlock("pipelineJob", ["deploy"], (job: DslWriter) => job
 *             .block("properties", (properties: DslWriter) => properties.call("disableConcurrentBuilds")))
 *         .toString();
 *
 * produces
 *
 *     pipelineJob('deploy') {
 *         properties {
 *             disableConcurrentBuilds()
 *         }
 *     }
 */
export class DslWriter {
    static INDENT: string = "    ";

    private lines: string[] = [];
    private depth: number = 0;

    /**
     * Renders a value as a Groovy literal. Strings are single-quoted so that `$` is never interpolated.
     *
     * @param {DslLiteral} value
     * @returns {string}
     */
    static literal(value: DslLiteral): string {
        if (value === null) {
            return "null";
        } else if (_.isString(value)) {
            return "'" + value
                .replace(/\\/g, "\\\\")
                .replace(/'/g, "\\'")
                .replace(/\n/g, "\\n")
                .replace(/\r/g, "\\r")
                .replace(/\t/g, "\\t") + "'";
        } else if (_.isNumber(value) && !_.isFinite(value)) {
            throw new Error("Cannot write " + value + " as a Job DSL literal.");
        } else {
            return String(value);
        }
    }

    static invocation(name: string, args: DslLiteral[]): string {
        return name + "(" + _.map(args, (arg: DslLiteral) => DslWriter.literal(arg)).join(", ") + ")";
    }

    /**
     * Writes a line as is, at the current indentation.
     */
    statement(text: string): DslWriter {
        this.lines.push(_.repeat(DslWriter.INDENT, this.depth) + text);
        return this;
    }

    call(name: string, ...args: DslLiteral[]): DslWriter {
        return this.statement(DslWriter.invocation(name, args));
    }

    /**
     * `name { ... }`
     */
    block(name: string, body: (writer: DslWriter) => void): DslWriter {
        return this.rawBlock(name, body);
    }

    /**
     * `name(args) { ... }`
     */
    callBlock(name: string, args: DslLiteral[], body: (writer: DslWriter) => void): DslWriter {
        return this.rawBlock(DslWriter.invocation(name, args), body);
    }

    /**
     * `head { ... }` where head is written as is.
     */
    rawBlock(head: string, body: (writer: DslWriter) => void): DslWriter {
        this.statement(head + " {");
        this.depth++;
        try {
            body(this);
        } finally {
            this.depth--;
        }
        return this.statement("}");
    }

    blankLine(): DslWriter {
        this.lines.push("");
        return this;
    }

    toString(): string {
        return this.lines.length === 0 ? "" : this.lines.join("\n") + "\n";
    }
}
