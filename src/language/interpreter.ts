import {
    type AssignmentAstNode,
    type AstNode,
    AstNodeKind,
    type BinaryOpAstNode,
    type BlockAstNode,
    type ExpressionAstNode,
    type ForAstNode,
    type FunctionCallAstNode,
    type IfAstNode,
    type ListAstNode,
    type WhileAstNode,
    unreachableNode,
} from "./ast.js";
import type { Diagnostic, DiagnosticKind } from "./diagnostic.js";
import {
    type Value,
    compareValues,
    isNumeric,
    isTruthy,
    toFloat,
    toInteger,
    typeName,
    valueToString,
    valuesEqual,
} from "./value.js";

export type Environment = Map<string, Value>;

export interface Builtin {
    // Exact number of positional arguments.
    arity: number;
    call: (...args: Value[]) => Value;
}

export const defaultBuiltins: ReadonlyMap<string, Builtin> = new Map<string, Builtin>([
    ["str", { arity: 1, call: (value) => valueToString(value) }],
]);

export interface InterpretOptions {
    environment?: Environment;
    builtins?: ReadonlyMap<string, Builtin>;
}

interface InterpreterState {
    environment: Environment;
    builtins: ReadonlyMap<string, Builtin>;
    output: string[];
    errors: Diagnostic[];
}

const reportError = (
    kind: DiagnosticKind,
    message: string,
    node: AstNode,
    state: InterpreterState,
) => {
    state.errors.push({
        kind,
        message,
        line: node.start.line,
        column: node.start.column,
    });
};

const reportUnsupportedOperands = (
    node: BinaryOpAstNode,
    left: Value,
    right: Value,
    state: InterpreterState,
) => {
    reportError(
        "TypeError",
        `unsupported operand type(s) for ${node.op}: '${typeName(left)}' and '${typeName(right)}'`,
        node,
        state,
    );
};

// Longest string or list an operator may build.
export const maxSequenceLength = 10_000_000;

const checkSequenceLength = (
    node: BinaryOpAstNode,
    length: bigint,
    state: InterpreterState,
) => {
    if (length <= BigInt(maxSequenceLength)) {
        return true;
    }

    reportError(
        "MemoryError",
        `sequence length ${length} exceeds ${maxSequenceLength}`,
        node,
        state,
    );

    return false;
};

const repeat = (items: Value[], count: bigint): Value[] => {
    const result: Value[] = [];

    for (let i = 0n; i < count; i++) {
        result.push(...items);
    }

    return result;
};

const applyNumericOp = (
    node: BinaryOpAstNode,
    left: bigint | number | boolean,
    right: bigint | number | boolean,
    state: InterpreterState,
): Value | undefined => {
    if (node.op === "/") {
        const divisor = toFloat(right);

        if (divisor === 0) {
            reportError("ZeroDivisionError", "division by zero", node, state);
            return;
        }

        return toFloat(left) / divisor;
    }

    if (typeof left === "number" || typeof right === "number") {
        const a = toFloat(left);
        const b = toFloat(right);

        switch (node.op) {
            case "+":
                return a + b;
            case "-":
                return a - b;
            default:
                return a * b;
        }
    }

    const a = toInteger(left);
    const b = toInteger(right);

    switch (node.op) {
        case "+":
            return a + b;
        case "-":
            return a - b;
        default:
            return a * b;
    }
};

const applyArithmetic = (
    node: BinaryOpAstNode,
    left: Value,
    right: Value,
    state: InterpreterState,
): Value | undefined => {
    if (isNumeric(left) && isNumeric(right)) {
        return applyNumericOp(node, left, right, state);
    }

    if (node.op === "+") {
        if (typeof left === "string" && typeof right === "string") {
            if (!checkSequenceLength(node, BigInt(left.length + right.length), state)) {
                return;
            }

            return left + right;
        }

        if (Array.isArray(left) && Array.isArray(right)) {
            if (!checkSequenceLength(node, BigInt(left.length + right.length), state)) {
                return;
            }

            return [...left, ...right];
        }
    }

    if (node.op === "*") {
        const [sequence, count] =
            typeof right === "bigint" || typeof right === "boolean" ? [left, right] : [right, left];

        if (typeof count === "bigint" || typeof count === "boolean") {
            const times = toInteger(count);

            if (typeof sequence === "string" || Array.isArray(sequence)) {
                const length = times > 0n ? BigInt(sequence.length) * times : 0n;

                if (!checkSequenceLength(node, length, state)) {
                    return;
                }
            }

            if (typeof sequence === "string") {
                return times > 0n ? sequence.repeat(Number(times)) : "";
            }

            if (Array.isArray(sequence)) {
                return repeat(sequence, times);
            }
        }
    }

    reportUnsupportedOperands(node, left, right, state);
    return;
};

const applyComparison = (
    node: BinaryOpAstNode,
    left: Value,
    right: Value,
    state: InterpreterState,
): Value | undefined => {
    if (node.op === "==") {
        return valuesEqual(left, right);
    }

    if (node.op === "!=") {
        return !valuesEqual(left, right);
    }

    const order = compareValues(left, right);

    if (order === undefined) {
        reportError(
            "TypeError",
            `'${node.op}' not supported between instances of '${typeName(left)}' and '${typeName(right)}'`,
            node,
            state,
        );
        return;
    }

    switch (node.op) {
        case "<":
            return order < 0;
        case ">":
            return order > 0;
        case "<=":
            return order <= 0;
        default:
            return order >= 0;
    }
};

const interpretBinaryOp = (node: BinaryOpAstNode, state: InterpreterState): Value | undefined => {
    const left = interpretExpression(node.left, state);

    if (left === undefined) {
        return;
    }

    const right = interpretExpression(node.right, state);

    if (right === undefined) {
        return;
    }

    switch (node.op) {
        case "+":
        case "-":
        case "*":
        case "/":
            return applyArithmetic(node, left, right, state);
        default:
            return applyComparison(node, left, right, state);
    }
};

const interpretList = (node: ListAstNode, state: InterpreterState): Value | undefined => {
    const values: Value[] = [];

    for (const item of node.items) {
        const value = interpretExpression(item, state);

        if (value === undefined) {
            return;
        }

        values.push(value);
    }

    return values;
};

const interpretFunctionCall = (
    node: FunctionCallAstNode,
    state: InterpreterState,
): Value | undefined => {
    const name = node.name.name;
    const builtin = state.builtins.get(name);

    if (!builtin) {
        reportError("NameError", `name '${name}' is not defined`, node, state);
        return;
    }

    const args: Value[] = [];

    for (const arg of node.args) {
        const value = interpretExpression(arg, state);

        if (value === undefined) {
            return;
        }

        args.push(value);
    }

    if (args.length !== builtin.arity) {
        const plural = builtin.arity === 1 ? "" : "s";

        reportError(
            "TypeError",
            `${name}() takes exactly ${builtin.arity} argument${plural} (${args.length} given)`,
            node,
            state,
        );
        return;
    }

    return builtin.call(...args);
};

const interpretExpression = (node: ExpressionAstNode, state: InterpreterState): Value | undefined => {
    switch (node.kind) {
        case AstNodeKind.NumberLiteral:
        case AstNodeKind.BooleanLiteral:
        case AstNodeKind.StringLiteral:
            return node.value;
        case AstNodeKind.Variable: {
            const value = state.environment.get(node.name);

            if (value === undefined) {
                reportError("NameError", `name '${node.name}' is not defined`, node, state);
            }

            return value;
        }
        case AstNodeKind.BinaryOp:
            return interpretBinaryOp(node, state);
        case AstNodeKind.List:
            return interpretList(node, state);
        case AstNodeKind.FunctionCall:
            return interpretFunctionCall(node, state);
        default:
            return unreachableNode(node);
    }
};

const interpretAssignment = (node: AssignmentAstNode, state: InterpreterState): Value | undefined => {
    const value = interpretExpression(node.value, state);

    if (value === undefined) {
        return;
    }

    state.environment.set(node.target.name, value);

    return value;
};

const interpretIf = (node: IfAstNode, state: InterpreterState): boolean => {
    const condition = interpretExpression(node.condition, state);

    if (condition === undefined) {
        return false;
    }

    if (isTruthy(condition)) {
        return interpretStatement(node.body, state);
    }

    if (node.elseBody) {
        return interpretStatement(node.elseBody, state);
    }

    return true;
};

const interpretRangeBound = (
    node: ExpressionAstNode,
    state: InterpreterState,
): bigint | undefined => {
    const value = interpretExpression(node, state);

    if (value === undefined) {
        return;
    }

    if (typeof value !== "bigint" && typeof value !== "boolean") {
        reportError(
            "TypeError",
            `'${typeName(value)}' object cannot be interpreted as an integer`,
            node,
            state,
        );
        return;
    }

    return toInteger(value);
};

const interpretFor = (node: ForAstNode, state: InterpreterState): boolean => {
    const start = interpretRangeBound(node.rangeStart, state);

    if (start === undefined) {
        return false;
    }

    const end = interpretRangeBound(node.rangeEnd, state);

    if (end === undefined) {
        return false;
    }

    for (let i = start; i < end; i++) {
        state.environment.set(node.iterator.name, i);

        if (!interpretStatement(node.body, state)) {
            return false;
        }
    }

    return true;
};

// Unbounded: a condition that never turns false never returns.
const interpretWhile = (node: WhileAstNode, state: InterpreterState): boolean => {
    while (true) {
        const condition = interpretExpression(node.condition, state);

        if (condition === undefined) {
            return false;
        }

        if (!isTruthy(condition)) {
            return true;
        }

        if (!interpretStatement(node.body, state)) {
            return false;
        }
    }
};

const interpretBlock = (node: BlockAstNode, state: InterpreterState): boolean => {
    for (const statement of node.statements) {
        if (!interpretStatement(statement, state)) {
            return false;
        }
    }

    return true;
};

const interpretStatement = (node: AstNode, state: InterpreterState): boolean => {
    switch (node.kind) {
        case AstNodeKind.Block:
            return interpretBlock(node, state);
        case AstNodeKind.Assignment:
            return interpretAssignment(node, state) !== undefined;
        case AstNodeKind.If:
            return interpretIf(node, state);
        case AstNodeKind.For:
            return interpretFor(node, state);
        case AstNodeKind.While:
            return interpretWhile(node, state);
        case AstNodeKind.Print: {
            const value = interpretExpression(node.expression, state);

            if (value === undefined) {
                return false;
            }

            state.output.push(valueToString(value), "\n");
            return true;
        }
        default:
            return interpretExpression(node, state) !== undefined;
    }
};

// Runs the root block and returns the value of its last statement when that
// statement is an expression or an assignment.
const interpretProgram = (ast: BlockAstNode, state: InterpreterState): Value | undefined => {
    let value: Value | undefined;

    for (const statement of ast.statements) {
        switch (statement.kind) {
            case AstNodeKind.Assignment:
                value = interpretAssignment(statement, state);

                if (value === undefined) {
                    return;
                }

                break;
            case AstNodeKind.Block:
            case AstNodeKind.If:
            case AstNodeKind.For:
            case AstNodeKind.While:
            case AstNodeKind.Print:
                if (!interpretStatement(statement, state)) {
                    return;
                }

                value = undefined;
                break;
            default:
                value = interpretExpression(statement, state);

                if (value === undefined) {
                    return;
                }
        }
    }

    return value;
};

export const interpret = (ast: BlockAstNode, options: InterpretOptions = {}) => {
    const state: InterpreterState = {
        environment: options.environment ?? new Map(),
        builtins: options.builtins ?? defaultBuiltins,
        output: [],
        errors: [],
    };

    const value = interpretProgram(ast, state);

    return {
        output: state.output.join(""),
        errors: state.errors,
        environment: state.environment,
        value,
    };
};
