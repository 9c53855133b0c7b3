export type DiagnosticKind =
    | "LexError"
    | "SyntaxError"
    | "NameError"
    | "TypeError"
    | "ZeroDivisionError"
    | "MemoryError";

export interface TextPosition {
    line: number;
    column: number;
}

export interface TextRange {
    start: TextPosition;
    end: TextPosition;
}

export interface Diagnostic {
    kind: DiagnosticKind;
    message: string;
    line: number;
    column: number;
    // Set on syntax errors raised at a token, absent at end of input.
    token?: {
        text: string;
        kind: string;
    };
}

export const formatDiagnostic = (diagnostic: Diagnostic) =>
    `${diagnostic.kind} at ${diagnostic.line}:${diagnostic.column}: ${diagnostic.message}`;
