import {describe, expect, it} from "vitest";

import {InvalidFieldDefinition, InvalidResourceName} from "../src/errors.js";
import {BaseType, Type} from "../src/types.js";

describe("BaseType", () => {
    it("recognises primitive types", () => {
        const type = new BaseType("int32");
        expect(type.isPrimitiveType()).toBe(true);
        expect(type.toString()).toBe("int32");
    });

    it("parses bounded strings", () => {
        const type = new BaseType("string<=5");
        expect(type.type).toBe("string");
        expect(type.stringUpperBound).toBe(5);
        expect(type.toString()).toBe("string<=5");
        expect(new BaseType("wstring<=2").stringUpperBound).toBe(2);
    });

    it("rejects string bounds that are not positive integers", () => {
        expect(() => new BaseType("string<=0")).toThrowError(InvalidFieldDefinition);
        expect(() => new BaseType("string<=abc")).toThrowError(
            "the upper bound of the string type 'string<=abc' must be a valid integer value > 0"
        );
    });

    it("parses fully qualified message types", () => {
        const type = new BaseType("geometry_msgs::msg::Point");
        expect(type.isPrimitiveType()).toBe(false);
        expect(type.pkgName).toBe("geometry_msgs");
        expect(type.namespace).toBe("msg");
        expect(type.type).toBe("Point");
        expect(type.toString()).toBe("geometry_msgs/Point");
    });

    it("resolves bare message types from the context", () => {
        const type = new BaseType("Point", "demo_msgs", "msg");
        expect(type.pkgName).toBe("demo_msgs");
        expect(type.namespace).toBe("msg");
    });

    it("rejects unqualified types without a context and invalid names", () => {
        expect(() => new BaseType("Point")).toThrowError(InvalidResourceName);
        expect(() => new BaseType("demo::Point")).toThrowError(InvalidResourceName);
        expect(() => new BaseType("Bad_Pkg::msg::Point")).toThrowError("Bad_Pkg");
        expect(() => new BaseType("demo_msgs::msg::point")).toThrowError("point");
    });

    it("compares package, name and bound but not the namespace", () => {
        expect(new BaseType("demo_msgs::msg::Foo").equals(new BaseType("demo_msgs::srv::Foo"))).toBe(true);
        expect(new BaseType("demo_msgs::msg::Foo").equals(new BaseType("other_msgs::msg::Foo"))).toBe(false);
        expect(new BaseType("string<=3").equals(new BaseType("string"))).toBe(false);
        expect(new BaseType("int32").equals(null)).toBe(false);
    });
});

describe("Type", () => {
    it("parses dynamic arrays", () => {
        const type = new Type("int32[]");
        expect(type.isArray).toBe(true);
        expect(type.arraySize).toBeNull();
        expect(type.isDynamicArray()).toBe(true);
        expect(type.isFixedSizeArray()).toBe(false);
        expect(type.toString()).toBe("int32[]");
    });

    it("parses fixed size arrays", () => {
        const type = new Type("float64[4]");
        expect(type.arraySize).toBe(4);
        expect(type.isDynamicArray()).toBe(false);
        expect(type.isFixedSizeArray()).toBe(true);
        expect(type.toString()).toBe("float64[4]");
    });

    it("parses bounded arrays of bounded strings", () => {
        const type = new Type("string<=8[<=3]");
        expect(type.isUpperBound).toBe(true);
        expect(type.arraySize).toBe(3);
        expect(type.stringUpperBound).toBe(8);
        expect(type.isDynamicArray()).toBe(true);
        expect(type.toString()).toBe("string<=8[<=3]");
    });

    it("keeps multi-word primitives together", () => {
        const type = new Type("unsigned long long[2]");
        expect(type.type).toBe("unsigned long long");
        expect(type.arraySize).toBe(2);
    });

    it("rejects malformed array suffixes", () => {
        expect(() => new Type("int32[0]")).toThrowError(InvalidFieldDefinition);
        expect(() => new Type("int32[<=]")).toThrowError(InvalidFieldDefinition);
        expect(() => new Type("int32]")).toThrowError("the type 'int32]' ends with ']' but does not contain a '['");
    });

    it("compares array information", () => {
        expect(new Type("int32[3]").equals(new Type("int32[3]"))).toBe(true);
        expect(new Type("int32[3]").equals(new Type("int32[4]"))).toBe(false);
        expect(new Type("int32[3]").equals(new Type("int32[<=3]"))).toBe(false);
        expect(new Type("int32").equals(new BaseType("int32"))).toBe(false);
    });

    it("derives the element type of an array", () => {
        const element = new Type("uint8[3]").elementType();
        expect(element.isArray).toBe(false);
        expect(element.toString()).toBe("uint8");
        expect(new Type("demo_msgs::msg::Foo[]").elementType().equals(new Type("demo_msgs::msg::Foo"))).toBe(true);
    });
});
