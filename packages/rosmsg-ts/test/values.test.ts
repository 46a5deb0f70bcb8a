import {describe, expect, it} from "vitest";

import {InvalidFieldDefinition, InvalidValue} from "../src/errors.js";
import {Type} from "../src/types.js";
import {
    findMatchingEndQuote,
    formatValue,
    parsePrimitiveValueString,
    parseStringArrayValueString,
    parseValueString
} from "../src/values.js";

describe("parsePrimitiveValueString", () => {
    it("parses booleans case-insensitively", () => {
        expect(parsePrimitiveValueString(new Type("bool"), "TRUE")).toBe(true);
        expect(parsePrimitiveValueString(new Type("boolean"), "1")).toBe(true);
        expect(parsePrimitiveValueString(new Type("bool"), "0")).toBe(false);
        expect(() => parsePrimitiveValueString(new Type("bool"), "yes")).toThrowError(
            "value 'yes' can not be converted to type 'bool': must be either 'true' / '1' or 'false' / '0'"
        );
    });

    it("checks integer ranges", () => {
        expect(parsePrimitiveValueString(new Type("int8"), "-128")).toBe(-128);
        expect(parsePrimitiveValueString(new Type("char"), "127")).toBe(127);
        expect(parsePrimitiveValueString(new Type("unsigned short"), "65535")).toBe(65535);
        expect(() => parsePrimitiveValueString(new Type("uint8"), "256")).toThrowError(
            "value '256' can not be converted to type 'uint8': must be a valid integer value >= 0 and <= 255"
        );
        expect(() => parsePrimitiveValueString(new Type("octet"), "-1")).toThrowError(InvalidValue);
        expect(() => parsePrimitiveValueString(new Type("int32"), "1.5")).toThrowError(InvalidValue);
    });

    it("returns 64-bit integers as bigint", () => {
        expect(parsePrimitiveValueString(new Type("int64"), "9223372036854775807")).toBe(9223372036854775807n);
        expect(parsePrimitiveValueString(new Type("unsigned long long"), "18446744073709551615")).toBe(18446744073709551615n);
        expect(() => parsePrimitiveValueString(new Type("int64"), "9223372036854775808")).toThrowError(InvalidValue);
        expect(() => parsePrimitiveValueString(new Type("uint64"), "-1")).toThrowError(InvalidValue);
    });

    it("parses floating point numbers", () => {
        expect(parsePrimitiveValueString(new Type("float64"), "1.5e3")).toBe(1500);
        expect(parsePrimitiveValueString(new Type("double"), ".25")).toBe(0.25);
        expect(parsePrimitiveValueString(new Type("float32"), "-inf")).toBe(-Infinity);
        expect(parsePrimitiveValueString(new Type("float"), "NaN")).toBeNaN();
        expect(() => parsePrimitiveValueString(new Type("float64"), "1,5")).toThrowError(
            "value '1,5' can not be converted to type 'float64': must be a floating point number using '.' as the separator"
        );
    });

    it("strips outer quotes and unescapes inner ones", () => {
        expect(parsePrimitiveValueString(new Type("string"), "\"hello world\"")).toBe("hello world");
        expect(parsePrimitiveValueString(new Type("string"), "'it\\'s'")).toBe("it's");
        expect(parsePrimitiveValueString(new Type("string"), "plain text")).toBe("plain text");
    });

    it("reads a lone quote as an empty string", () => {
        expect(parsePrimitiveValueString(new Type("string"), "\"")).toBe("");
        expect(parsePrimitiveValueString(new Type("string"), "'")).toBe("");
    });

    it("rejects unescaped inner quotes", () => {
        expect(() => parsePrimitiveValueString(new Type("string"), "\"say \"hi\"\"")).toThrowError(
            "value 'say \"hi\"' can not be converted to type 'string': string inner quotes not properly escaped"
        );
    });

    it("enforces string bounds", () => {
        expect(parsePrimitiveValueString(new Type("string<=3"), "abc")).toBe("abc");
        expect(() => parsePrimitiveValueString(new Type("string<=3"), "abcd")).toThrowError(
            "value 'abcd' can not be converted to type 'string<=3': string must not exceed the maximum length of 3 characters"
        );
    });

    it("accepts exactly one wide character", () => {
        expect(parsePrimitiveValueString(new Type("wchar"), "'x'")).toBe("x");
        expect(() => parsePrimitiveValueString(new Type("wchar"), "xy")).toThrowError(
            "value 'xy' can not be converted to type 'wchar': must be a single character"
        );
    });

    it("refuses array and message types", () => {
        expect(() => parsePrimitiveValueString(new Type("int32[]"), "1")).toThrowError(TypeError);
        expect(() => parsePrimitiveValueString(new Type("demo_msgs::msg::Foo"), "1")).toThrowError(TypeError);
    });
});

describe("parseValueString", () => {
    it("parses primitive arrays", () => {
        expect(parseValueString(new Type("int32[]"), "[1, 2, 3]")).toEqual([1, 2, 3]);
        expect(parseValueString(new Type("int32[]"), "[]")).toEqual([]);
        expect(parseValueString(new Type("bool[2]"), "[true, 0]")).toEqual([true, false]);
    });

    it("checks fixed and bounded sizes", () => {
        expect(() => parseValueString(new Type("int32[2]"), "[1]")).toThrowError(
            "value '[1]' can not be converted to type 'int32[2]': array must have exactly 2 elements, not 1"
        );
        expect(() => parseValueString(new Type("int32[<=2]"), "[1, 2, 3]")).toThrowError(
            "value '[1, 2, 3]' can not be converted to type 'int32[<=2]': array must have not more than 2 elements, not 3"
        );
        expect(parseValueString(new Type("int32[<=2]"), "[1]")).toEqual([1]);
    });

    it("requires brackets around arrays", () => {
        expect(() => parseValueString(new Type("int32[]"), "1, 2")).toThrowError(
            "value '1, 2' can not be converted to type 'int32[]': array value must start with '[' and end with ']'"
        );
    });

    it("reports the failing element", () => {
        expect(() => parseValueString(new Type("uint8[]"), "[1, 300]")).toThrowError(
            "value '[1, 300]' can not be converted to type 'uint8[]': element 1 with value '300' can not be converted to type 'uint8': must be a valid integer value >= 0 and <= 255"
        );
    });

    it("keeps commas inside quoted string elements", () => {
        expect(parseValueString(new Type("string[]"), "[\"a, b\", 'c', d]")).toEqual(["a, b", "c", "d"]);
    });

    it("refuses message types", () => {
        expect(() => parseValueString(new Type("demo_msgs::msg::Foo"), "x")).toThrowError(InvalidFieldDefinition);
    });
});

describe("parseStringArrayValueString", () => {
    it("unescapes quotes inside quoted elements", () => {
        expect(parseStringArrayValueString("\"a\\\"b\", c")).toEqual(["a\"b", "c"]);
    });

    it("ignores a trailing separator", () => {
        expect(parseStringArrayValueString("a,")).toEqual(["a"]);
    });

    it("rejects a leading separator", () => {
        expect(() => parseStringArrayValueString(", a")).toThrowError(
            "value ', a' can not be converted to type 'string': unexpected ',' at beginning of [, a]"
        );
    });

    it("rejects unterminated quotes", () => {
        expect(() => parseStringArrayValueString("\"abc")).toThrowError(
            "value '\"abc' can not be converted to type 'string': string [\"abc] incorrectly quoted"
        );
    });
});

describe("findMatchingEndQuote", () => {
    it("skips escaped quotes", () => {
        expect(findMatchingEndQuote("'ab'", "'")).toBe(3);
        expect(findMatchingEndQuote("'a\\'b'", "'")).toBe(5);
        expect(findMatchingEndQuote("'abc", "'")).toBe(-1);
    });
});

describe("formatValue", () => {
    it("quotes strings and brackets arrays", () => {
        expect(formatValue("x")).toBe("'x'");
        expect(formatValue([1n, 2n])).toBe("[1, 2]");
        expect(formatValue(["a", "b"])).toBe("['a', 'b']");
        expect(formatValue(false)).toBe("false");
    });
});
