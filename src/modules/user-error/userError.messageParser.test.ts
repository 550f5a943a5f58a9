import { describe, expect, it } from "vitest";

import { parseUserErrorMessage } from "./userError.messageParser";

describe("parseUserErrorMessage", () => {
	it("returns a bare key with no parameters", () => {
		expect(parseUserErrorMessage("foo.bar")).toEqual({
			key: "foo.bar",
			parameters: {},
		});
	});

	it("unquotes a quoted key", () => {
		expect(parseUserErrorMessage('"foo.bar"')).toEqual({
			key: "foo.bar",
			parameters: {},
		});
	});

	it("extracts parameters and keeps pipes inside quoted values", () => {
		expect(
			parseUserErrorMessage('some.key|name:value|other:"has a | pipe"')
		).toEqual({
			key: "some.key",
			parameters: { "%name%": "value", "%other%": "has a | pipe" },
		});
	});

	it("unescapes doubled quotes in key and values", () => {
		expect(parseUserErrorMessage('"quoted ""key"""|p:"a""b"')).toEqual({
			key: 'quoted "key"',
			parameters: { "%p%": 'a"b' },
		});
	});

	it("lets a later duplicate parameter overwrite the earlier one", () => {
		const parsed = parseUserErrorMessage("k|x:1|y:2|x:3");

		expect(parsed.parameters).toEqual({ "%x%": "3", "%y%": "2" });
		expect(Object.keys(parsed.parameters)).toEqual(["%x%", "%y%"]);
	});

	it("keeps parameters in order of appearance", () => {
		const parsed = parseUserErrorMessage("k|b:1|a:2|c:3");

		expect(Object.keys(parsed.parameters)).toEqual(["%b%", "%a%", "%c%"]);
	});

	it("drops a parameter whose name starts with a digit but keeps the key", () => {
		expect(parseUserErrorMessage("k|1bad:val")).toEqual({
			key: "k",
			parameters: {},
		});
	});

	it("stops at the first malformed segment", () => {
		expect(parseUserErrorMessage("k|a:1|no colon here|b:2")).toEqual({
			key: "k",
			parameters: { "%a%": "1" },
		});
	});

	it("stops at a parameter with an empty value", () => {
		expect(parseUserErrorMessage("k|a:|b:2")).toEqual({
			key: "k",
			parameters: {},
		});
	});

	it("preserves the casing of parameter names", () => {
		expect(parseUserErrorMessage("k|OrderId:42|_max_Items:7").parameters).toEqual({
			"%OrderId%": "42",
			"%_max_Items%": "7",
		});
	});

	it("trims whitespace around key, pipes and values", () => {
		expect(
			parseUserErrorMessage("  order.too_large  |  max : 5 | min:  2  ")
		).toEqual({
			key: "order.too_large",
			parameters: {},
		});

		expect(parseUserErrorMessage("  order.too_large  |  max:5  | min:  2  ")).toEqual({
			key: "order.too_large",
			parameters: { "%max%": "5", "%min%": "2" },
		});
	});

	it("keeps whitespace inside quoted values", () => {
		expect(parseUserErrorMessage('k|v: "  padded  " ')).toEqual({
			key: "k",
			parameters: { "%v%": "  padded  " },
		});
	});

	it("treats a pipe inside a quoted key as part of the key", () => {
		expect(parseUserErrorMessage('"a | b"|x:1')).toEqual({
			key: "a | b",
			parameters: { "%x%": "1" },
		});
	});

	it("ignores text between a quoted value and the next pipe", () => {
		expect(parseUserErrorMessage('k|p:"a"b|q:1')).toEqual({
			key: "k",
			parameters: { "%p%": "a", "%q%": "1" },
		});
	});

	it("treats a quoted key followed by more text as an unquoted run", () => {
		expect(parseUserErrorMessage('"a" b|x:1')).toEqual({
			key: 'a" ',
			parameters: { "%x%": "1" },
		});
	});

	it("returns the whole input untouched when no key can be read", () => {
		expect(parseUserErrorMessage(" |x:1")).toEqual({
			key: " |x:1",
			parameters: {},
		});
		expect(parseUserErrorMessage("")).toEqual({ key: "", parameters: {} });
	});

	it("returns the whole input when an unclosed quoted key meets a malformed tail", () => {
		expect(parseUserErrorMessage('"a|b')).toEqual({ key: '"a|b', parameters: {} });
		expect(parseUserErrorMessage('"order|oops')).toEqual({
			key: '"order|oops',
			parameters: {},
		});
		expect(parseUserErrorMessage('"a" b|1x:2')).toEqual({
			key: '"a" b|1x:2',
			parameters: {},
		});
	});

	it("keeps parsing an unclosed quoted key when the parameters are well formed", () => {
		expect(parseUserErrorMessage('"a|b:1')).toEqual({
			key: "",
			parameters: { "%b%": "1" },
		});
	});

	it("reads whitespace-only input as an empty key", () => {
		expect(parseUserErrorMessage("   ")).toEqual({ key: "", parameters: {} });
	});

	it("reads an empty quoted key as empty", () => {
		expect(parseUserErrorMessage('""|x:1')).toEqual({
			key: "",
			parameters: { "%x%": "1" },
		});
	});

	it("returns the trimmed input as key when there is no pipe", () => {
		for (const input of ["plain", "  spaced key  ", "with: colon", "\tkey\n"]) {
			expect(parseUserErrorMessage(input)).toEqual({
				key: input.trim(),
				parameters: {},
			});
		}
	});

	it("returns an extracted key unchanged when parsed again", () => {
		const inputs = [
			"order.too_large|max:5",
			'"quoted ""key"""|p:1',
			'  "spaced key"  |x:"y"',
		];

		for (const input of inputs) {
			const { key } = parseUserErrorMessage(input);
			expect(parseUserErrorMessage(key)).toEqual({ key, parameters: {} });
		}
	});
});
