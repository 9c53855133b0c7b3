import type { BlockAstNode } from "./ast.js";
import type { Diagnostic } from "./diagnostic.js";
import { type Builtin, type Environment, interpret } from "./interpreter.js";
import { parse } from "./parser.js";
import { tokenize } from "./tokenizer.js";
import type { Value } from "./value.js";

export interface ParseResult {
    ast?: BlockAstNode;
    errors: Diagnostic[];
}

export interface RunResult {
    output: string;
    errors: Diagnostic[];
    environment: Environment;
    // Value of the last top-level expression or assignment, if the run ended on one.
    value: Value | undefined;
}

export const parseScript = (script: string): ParseResult => {
    const tokenizeResult = tokenize(script);

    // The tokenizer keeps going after a bad character, but only the first
    // diagnostic of a failed parse is reported.
    if (tokenizeResult.errors.length > 0) {
        return {
            ast: undefined,
            errors: tokenizeResult.errors.slice(0, 1),
        };
    }

    return parse(tokenizeResult.tokens);
};

export const run = (
    ast: BlockAstNode,
    environment: Environment = new Map(),
    builtins?: ReadonlyMap<string, Builtin>,
): RunResult => interpret(ast, { environment, builtins });

export const evaluate = (script: string, environment?: Environment) => {
    const parseResult = parseScript(script);

    if (parseResult.errors.length > 0 || !parseResult.ast) {
        return {
            output: "",
            errors: parseResult.errors,
        };
    }

    const { output, errors } = run(parseResult.ast, environment);

    return {
        output,
        errors,
    };
};
