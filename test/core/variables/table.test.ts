// CHANGE: Specs for the variable table
// WHY: Persistence restores the table; the evaluator writes through it
// FORMAT THEOREM: restore(s) = Left(_) ⇒ table unchanged
// PURITY: CORE
// COMPLEXITY: O(n) per assertion

import { Either, Option } from "effect";
import { describe, expect, it } from "vitest";

import {
	RESERVED_NAMES,
	validateVariableName,
	VariableTable,
} from "../../../src/core/variables/table.js";
import { errorOf, q, valueOf } from "../../utils/values.js";

describe("validateVariableName", () => {
	it.each(["x", "rate2", "A_b_1"])("accepts %s", (name) => {
		expect(valueOf(validateVariableName(name))).toBe(name);
	});

	it.each(["", "1x", "_x", "a-b", "é"])("rejects %j as invalid", (name) => {
		expect(errorOf(validateVariableName(name)).reason).toBe("InvalidName");
	});

	it("rejects the root function names as reserved", () => {
		expect([...RESERVED_NAMES]).toEqual(["sqrt", "cbrt"]);
		expect(errorOf(validateVariableName("sqrt")).reason).toBe("ReservedName");
		expect(errorOf(validateVariableName("cbrt")).name).toBe("cbrt");
	});
});

describe("VariableTable", () => {
	it("stores, overwrites and removes values", () => {
		const table = new VariableTable();
		valueOf(table.set("x", q(1)));
		valueOf(table.set("x", q(2)));
		expect(table.get("x")).toEqual(Option.some(q(2)));
		expect(table.has("x")).toBe(true);
		expect(table.remove("x")).toBe(true);
		expect(table.remove("x")).toBe(false);
		expect(Option.isNone(table.get("x"))).toBe(true);
	});

	it("is case-sensitive", () => {
		const table = new VariableTable();
		valueOf(table.set("x", q(1)));
		expect(Option.isNone(table.get("X"))).toBe(true);
	});

	it("refuses invalid names without storing them", () => {
		const table = new VariableTable();
		expect(Either.isLeft(table.set("2x", q(1)))).toBe(true);
		expect(table.size).toBe(0);
	});

	it("snapshots in first-assignment order", () => {
		const table = new VariableTable();
		valueOf(table.set("b", q(1)));
		valueOf(table.set("a", q(2)));
		valueOf(table.set("b", q(3)));
		expect(table.names()).toEqual(["b", "a"]);
		expect(table.snapshot()).toEqual([
			["b", q(3)],
			["a", q(2)],
		]);
	});

	it("restores a snapshot, replacing previous contents", () => {
		const table = new VariableTable();
		valueOf(table.set("old", q(9)));
		valueOf(table.restore([["x", q(1, 2)]]));
		expect(table.snapshot()).toEqual([["x", q(1, 2)]]);
	});

	it("restores all or nothing", () => {
		const table = new VariableTable();
		valueOf(table.set("keep", q(1)));
		const result = table.restore([
			["x", q(1)],
			["sqrt", q(2)],
		]);
		expect(errorOf(result).reason).toBe("ReservedName");
		expect(table.snapshot()).toEqual([["keep", q(1)]]);
	});

	it("exposes an evaluation scope backed by the table", () => {
		const table = new VariableTable();
		const scope = table.scope();
		valueOf(scope.assign("x", q(4)));
		expect(scope.lookup("x")).toEqual(Option.some(q(4)));
		expect(table.get("x")).toEqual(Option.some(q(4)));
		expect(errorOf(scope.assign("cbrt", q(1))).reason).toBe("ReservedName");
	});
});
