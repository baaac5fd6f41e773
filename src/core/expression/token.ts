// CHANGE: Closed token variant for the expression lexer
// PURITY: CORE
// INVARIANT: span.start < span.end for every token except `end` (start = end = |source|)

/** Half-open source range in UTF-16 code units. */
export interface Span {
	readonly start: number;
	readonly end: number;
}

export type BinaryOperator = "+" | "-" | "*" | "/" | "^";

/** `√` is both prefix (square root) and infix (`n√x`). */
export type Operator = BinaryOperator | "√";

export type Token =
	| { readonly kind: "number"; readonly text: string; readonly span: Span }
	| { readonly kind: "identifier"; readonly name: string; readonly span: Span }
	| { readonly kind: "operator"; readonly op: Operator; readonly span: Span }
	| { readonly kind: "lparen"; readonly span: Span }
	| { readonly kind: "rparen"; readonly span: Span }
	| { readonly kind: "assign"; readonly span: Span }
	| { readonly kind: "end"; readonly span: Span };

export const describeToken = (token: Token): string => {
	switch (token.kind) {
		case "number":
			return `number ${token.text}`;
		case "identifier":
			return `identifier ${token.name}`;
		case "operator":
			return `'${token.op}'`;
		case "lparen":
			return "'('";
		case "rparen":
			return "')'";
		case "assign":
			return "'='";
		case "end":
			return "end of expression";
		default: {
			const _exhaustive: never = token;
			return String(_exhaustive);
		}
	}
};
