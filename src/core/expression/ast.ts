// CHANGE: Immutable expression tree for parsed calculator input
// PURITY: CORE
// INVARIANT: Tree is acyclic; every node owns its children; `assignment` only at the root

import type { Rational } from "../number/rational.js";
import type { BinaryOperator } from "./token.js";

export type Expression =
	| { readonly kind: "literal"; readonly value: Rational }
	| { readonly kind: "variable"; readonly name: string }
	| { readonly kind: "unary"; readonly op: "-"; readonly operand: Expression }
	| {
			readonly kind: "binary";
			readonly op: BinaryOperator;
			readonly left: Expression;
			readonly right: Expression;
	  }
	| {
			readonly kind: "root";
			readonly degree: Expression;
			readonly radicand: Expression;
	  }
	| {
			readonly kind: "assignment";
			readonly name: string;
			readonly value: Expression;
	  };

/** Built-in root functions callable as `name(expr)`, mapped to their degree. */
export const ROOT_FUNCTIONS: ReadonlyMap<string, bigint> = new Map([
	["sqrt", 2n],
	["cbrt", 3n],
]);
