import { type AstNode, AstNodeKind, unreachableNode } from "./ast.js";
import { valueToString } from "./value.js";

const indent = (depth: number) => "  ".repeat(depth);

const renderSection = (label: string, node: AstNode, depth: number, lines: string[]) => {
    lines.push(`${indent(depth)}${label}:`);
    renderNode(node, depth + 1, lines);
};

const renderNode = (node: AstNode, depth: number, lines: string[]): void => {
    const prefix = indent(depth);

    switch (node.kind) {
        case AstNodeKind.Block:
            lines.push(`${prefix}Block:`);

            for (const statement of node.statements) {
                renderNode(statement, depth + 1, lines);
            }

            return;
        case AstNodeKind.BinaryOp:
            lines.push(`${prefix}BinOp(op='${node.op}')`);
            renderNode(node.left, depth + 1, lines);
            renderNode(node.right, depth + 1, lines);
            return;
        case AstNodeKind.NumberLiteral:
            lines.push(`${prefix}Number(${valueToString(node.value)})`);
            return;
        case AstNodeKind.BooleanLiteral:
            lines.push(`${prefix}Boolean(${valueToString(node.value)})`);
            return;
        case AstNodeKind.StringLiteral:
            lines.push(`${prefix}String(${node.value})`);
            return;
        case AstNodeKind.Variable:
            lines.push(`${prefix}Variable(${node.name})`);
            return;
        case AstNodeKind.Assignment:
            lines.push(`${prefix}Assignment:`);
            renderNode(node.target, depth + 1, lines);
            renderNode(node.value, depth + 1, lines);
            return;
        case AstNodeKind.List:
            lines.push(`${prefix}List:`);

            for (const item of node.items) {
                renderNode(item, depth + 1, lines);
            }

            return;
        case AstNodeKind.If:
            lines.push(`${prefix}If:`);
            renderSection("Condition", node.condition, depth + 1, lines);
            renderSection("Body", node.body, depth + 1, lines);

            if (node.elseBody) {
                renderSection("Else", node.elseBody, depth + 1, lines);
            }

            return;
        case AstNodeKind.For:
            lines.push(`${prefix}For:`);
            lines.push(`${prefix}  Iterator: ${node.iterator.name}`);
            renderSection("Range Start", node.rangeStart, depth + 1, lines);
            renderSection("Range End", node.rangeEnd, depth + 1, lines);
            renderSection("Body", node.body, depth + 1, lines);
            return;
        case AstNodeKind.While:
            lines.push(`${prefix}While:`);
            renderSection("Condition", node.condition, depth + 1, lines);
            renderSection("Body", node.body, depth + 1, lines);
            return;
        case AstNodeKind.Print:
            lines.push(`${prefix}Print:`);
            renderNode(node.expression, depth + 1, lines);
            return;
        case AstNodeKind.FunctionCall:
            lines.push(`${prefix}FunctionCall(${node.name.name}):`);
            lines.push(`${prefix}  Args:`);

            for (const arg of node.args) {
                renderNode(arg, depth + 2, lines);
            }

            return;
        default:
            unreachableNode(node);
    }
};

export const renderAst = (node: AstNode): string => {
    const lines: string[] = [];

    renderNode(node, 0, lines);

    return lines.join("\n");
};
