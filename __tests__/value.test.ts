import test from "node:test";
import assert from "node:assert";
import {
    compareValues,
    isTruthy,
    typeName,
    valueToString,
    valuesEqual,
} from "../src/language/value.js";

test("value to string", () => {
    assert.strictEqual(valueToString(42n), "42");
    assert.strictEqual(valueToString(2), "2.0");
    assert.strictEqual(valueToString(0.1 + 0.2), "0.30000000000000004");
    assert.strictEqual(valueToString(1e16), "1e+16");
    assert.strictEqual(valueToString(1.2345678901234568e20), "1.2345678901234568e+20");
    assert.strictEqual(valueToString(0.0001), "0.0001");
    assert.strictEqual(valueToString(0.00001), "1e-05");
    assert.strictEqual(valueToString(-2.5e-7), "-2.5e-07");
    assert.strictEqual(valueToString(123456789012345), "123456789012345.0");
    assert.strictEqual(valueToString(-0), "-0.0");
    assert.strictEqual(valueToString(0), "0.0");
    assert.strictEqual(valueToString(Infinity), "inf");
    assert.strictEqual(valueToString(-Infinity), "-inf");
    assert.strictEqual(valueToString(NaN), "nan");
    assert.strictEqual(valueToString(true), "True");
    assert.strictEqual(valueToString("hi"), "hi");
    assert.strictEqual(valueToString([1n, true, "a", [2.5]]), "[1, True, 'a', [2.5]]");
});

test("type names", () => {
    assert.deepStrictEqual(
        [1n, 1.5, false, "s", []].map(typeName),
        ["int", "float", "bool", "str", "list"],
    );
});

test("truthiness", () => {
    assert.deepStrictEqual(
        [0n, 0, false, "", []].map(isTruthy),
        [false, false, false, false, false],
    );
    assert.deepStrictEqual(
        [-1n, 0.5, true, "0", [0n]].map(isTruthy),
        [true, true, true, true, true],
    );
});

test("equality across numeric types", () => {
    assert.strictEqual(valuesEqual(1n, 1), true);
    assert.strictEqual(valuesEqual(true, 1n), true);
    assert.strictEqual(valuesEqual([1n, "a"], [1, "a"]), true);
    assert.strictEqual(valuesEqual("1", 1n), false);
    assert.strictEqual(valuesEqual([1n], [1n, 2n]), false);
});

test("ordering", () => {
    assert.strictEqual(compareValues(2n, 1.5), 1);
    assert.strictEqual(compareValues("a", "b"), -1);
    assert.strictEqual(compareValues([1n, 2n], [1n, 3n]), -1);
    assert.strictEqual(compareValues([1n], [1n, 0n]), -1);
    assert.strictEqual(compareValues([2n], [2n]), 0);
    assert.strictEqual(compareValues("a", 1n), undefined);
    assert.ok(Number.isNaN(compareValues(NaN, 1)));
});
