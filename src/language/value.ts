// bigint is the language's int, number its float.
export type Value = bigint | number | boolean | string | Value[];

export type NumericValue = bigint | number | boolean;

export const typeName = (value: Value): string => {
    switch (typeof value) {
        case "bigint":
            return "int";
        case "number":
            return "float";
        case "boolean":
            return "bool";
        case "string":
            return "str";
        default:
            return "list";
    }
};

export const isNumeric = (value: Value): value is NumericValue =>
    typeof value === "bigint" || typeof value === "number" || typeof value === "boolean";

// Booleans take part in arithmetic as 0 and 1.
export const toInteger = (value: bigint | boolean): bigint => {
    if (typeof value === "boolean") {
        return value ? 1n : 0n;
    }

    return value;
};

export const toFloat = (value: NumericValue): number => {
    if (typeof value === "number") {
        return value;
    }

    return Number(toInteger(value));
};

export const isTruthy = (value: Value): boolean => {
    if (Array.isArray(value)) {
        return value.length > 0;
    }

    switch (typeof value) {
        case "bigint":
            return value !== 0n;
        case "number":
            return value !== 0;
        case "boolean":
            return value;
        default:
            return value.length > 0;
    }
};

// Shortest round-trip digits, written positionally for magnitudes in
// [1e-4, 1e16) and in exponent form (two-digit exponent) outside it.
const floatToString = (value: number): string => {
    if (Number.isNaN(value)) {
        return "nan";
    }

    if (!Number.isFinite(value)) {
        return value > 0 ? "inf" : "-inf";
    }

    if (value === 0) {
        return Object.is(value, -0) ? "-0.0" : "0.0";
    }

    const magnitude = Math.abs(value);

    if (magnitude < 1e-4 || magnitude >= 1e16) {
        const [mantissa, exponent] = value.toExponential().split("e");
        const sign = exponent.startsWith("-") ? "-" : "+";

        return `${mantissa}e${sign}${exponent.slice(1).padStart(2, "0")}`;
    }

    return Number.isInteger(value) ? value.toFixed(1) : value.toString();
};

const valueToRepr = (value: Value): string => {
    if (typeof value === "string") {
        return `'${value}'`;
    }

    return valueToString(value);
};

export const valueToString = (value: Value): string => {
    if (Array.isArray(value)) {
        return `[${value.map(valueToRepr).join(", ")}]`;
    }

    switch (typeof value) {
        case "bigint":
            return value.toString();
        case "number":
            return floatToString(value);
        case "boolean":
            return value ? "True" : "False";
        default:
            return value;
    }
};

export const valuesEqual = (left: Value, right: Value): boolean => {
    if (isNumeric(left) && isNumeric(right)) {
        if (typeof left === "number" || typeof right === "number") {
            return toFloat(left) === toFloat(right);
        }

        return toInteger(left) === toInteger(right);
    }

    if (Array.isArray(left) && Array.isArray(right)) {
        return (
            left.length === right.length && left.every((item, i) => valuesEqual(item, right[i]))
        );
    }

    return left === right;
};

const compareFloats = (left: number, right: number) => {
    if (left < right) {
        return -1;
    }

    if (left > right) {
        return 1;
    }

    return left === right ? 0 : NaN;
};

// Returns -1, 0 or 1, NaN when a float operand is nan, or undefined when the
// two values have no ordering at all.
export const compareValues = (left: Value, right: Value): number | undefined => {
    if (isNumeric(left) && isNumeric(right)) {
        if (typeof left === "number" || typeof right === "number") {
            return compareFloats(toFloat(left), toFloat(right));
        }

        const difference = toInteger(left) - toInteger(right);

        return difference === 0n ? 0 : difference < 0n ? -1 : 1;
    }

    if (typeof left === "string" && typeof right === "string") {
        return left === right ? 0 : left < right ? -1 : 1;
    }

    if (Array.isArray(left) && Array.isArray(right)) {
        const length = Math.min(left.length, right.length);

        for (let i = 0; i < length; i++) {
            if (valuesEqual(left[i], right[i])) {
                continue;
            }

            return compareValues(left[i], right[i]);
        }

        return Math.sign(left.length - right.length);
    }

    return undefined;
};
