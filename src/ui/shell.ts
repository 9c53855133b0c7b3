import { formatDiagnostic } from "../language/diagnostic.js";
import { parseScript, run } from "../language/evaluate.js";
import { renderAst } from "../language/printer.js";

export interface ShellResult {
    astText: string;
    outputText: string;
    succeeded: boolean;
}

export const runSource = (source: string): ShellResult => {
    const parseResult = parseScript(source);

    if (!parseResult.ast) {
        return {
            astText: "",
            outputText: parseResult.errors.map(formatDiagnostic).join("\n"),
            succeeded: false,
        };
    }

    const result = run(parseResult.ast);

    return {
        astText: renderAst(parseResult.ast),
        outputText: result.output + result.errors.map(formatDiagnostic).join("\n"),
        succeeded: result.errors.length === 0,
    };
};

// Base64 of the UTF-8 bytes, so that scripts outside Latin-1 survive btoa.
export const encodeScript = (script: string) => {
    const bytes = new TextEncoder().encode(script);
    let binary = "";

    for (const byte of bytes) {
        binary += String.fromCharCode(byte);
    }

    return btoa(binary);
};

export const decodeScript = (encoded: string) =>
    new TextDecoder().decode(Uint8Array.from(atob(encoded), (char) => char.charCodeAt(0)));

export const scriptFromQuery = (search: string): string | undefined => {
    if (search.length <= 1) {
        return;
    }

    return decodeScript(search.slice(1));
};
