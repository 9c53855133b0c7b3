#!/usr/bin/env node

import { createInterface } from "node:readline";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runMenu } from "./menu.js";
import { type ScriptRunResult, runScript, runScriptFile } from "./runScript.js";

const argv = await yargs(hideBin(process.argv))
    .scriptName("plume")
    .command("$0 [file]", "Run a Plume script, or open the interactive menu without one")
    .positional("file", {
        describe: "Path of the script to run",
        type: "string",
    })
    .env("PLUME")
    .options({
        ast: {
            default: false,
            describe: "Print the syntax tree before running",
            type: "boolean",
        },
        eval: {
            alias: "e",
            describe: "Source to run instead of a file",
            type: "string",
        },
    })
    .strict()
    .help()
    .parseAsync();

const writeResult = (result: ScriptRunResult) => {
    process.stdout.write(result.stdout);
    process.stderr.write(result.stderr);
    process.exitCode = result.exitCode;
};

if (argv.eval !== undefined) {
    writeResult(runScript(argv.eval, { showAst: argv.ast }));
} else if (argv.file !== undefined) {
    writeResult(await runScriptFile(argv.file, { showAst: argv.ast }));
} else {
    const readline = createInterface({
        input: process.stdin,
        output: process.stdout,
    });

    let isClosed = false;
    let cancelQuestion: (() => void) | undefined;

    readline.on("close", () => {
        isClosed = true;
        cancelQuestion?.();
    });

    const ask = (question: string) =>
        new Promise<string | undefined>((resolve) => {
            if (isClosed) {
                resolve(undefined);
                return;
            }

            cancelQuestion = () => resolve(undefined);
            readline.question(question, resolve);
        });

    await runMenu(ask, (text) => process.stdout.write(text));
    readline.close();
}
