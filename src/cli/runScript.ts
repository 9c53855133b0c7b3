import { readFile } from "node:fs/promises";
import { formatDiagnostic, parseScript, renderAst, run } from "../language/index.js";

export interface ScriptRunOptions {
    showAst: boolean;
}

export interface ScriptRunResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export const runScript = (source: string, options: ScriptRunOptions): ScriptRunResult => {
    const parseResult = parseScript(source);

    if (!parseResult.ast) {
        return {
            stdout: "",
            stderr: parseResult.errors.map((error) => formatDiagnostic(error) + "\n").join(""),
            exitCode: 1,
        };
    }

    const result = run(parseResult.ast);
    const stdout = options.showAst
        ? renderAst(parseResult.ast) + "\n" + result.output
        : result.output;

    return {
        stdout,
        stderr: result.errors.map((error) => formatDiagnostic(error) + "\n").join(""),
        exitCode: result.errors.length > 0 ? 1 : 0,
    };
};

export type ReadText = (path: string) => Promise<string>;

const readUtf8: ReadText = (path) => readFile(path, "utf8");

export const runScriptFile = async (
    path: string,
    options: ScriptRunOptions,
    read: ReadText = readUtf8,
): Promise<ScriptRunResult> => {
    let source: string;

    try {
        source = await read(path);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);

        return {
            stdout: "",
            stderr: `Cannot read ${path}: ${message}\n`,
            exitCode: 1,
        };
    }

    return runScript(source, options);
};
