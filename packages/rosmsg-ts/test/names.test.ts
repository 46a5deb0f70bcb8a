import {describe, expect, it} from "vitest";

import {isValidConstantName, isValidFieldName, isValidMessageName, isValidPackageName} from "../src/names.js";

describe("isValidPackageName", () => {
    it("accepts lower case names with single underscores", () => {
        expect(isValidPackageName("geometry_msgs")).toBe(true);
        expect(isValidPackageName("std2")).toBe(true);
    });

    it("rejects upper case, doubled and trailing underscores", () => {
        expect(isValidPackageName("Geometry")).toBe(false);
        expect(isValidPackageName("my__pkg")).toBe(false);
        expect(isValidPackageName("pkg_")).toBe(false);
        expect(isValidPackageName("")).toBe(false);
    });
});

describe("isValidFieldName", () => {
    it("accepts single letters and snake case", () => {
        expect(isValidFieldName("x")).toBe(true);
        expect(isValidFieldName("linear_velocity")).toBe(true);
    });

    it("rejects leading digits and capitals", () => {
        expect(isValidFieldName("2d")).toBe(false);
        expect(isValidFieldName("Value")).toBe(false);
    });
});

describe("isValidMessageName", () => {
    it("accepts camel case names", () => {
        expect(isValidMessageName("Point")).toBe(true);
        expect(isValidMessageName("Point3D")).toBe(true);
    });

    it("ignores one service suffix and the sample prefix", () => {
        expect(isValidMessageName("AddTwo_Request")).toBe(true);
        expect(isValidMessageName("AddTwo_Response")).toBe(true);
        expect(isValidMessageName("Sample_Point")).toBe(true);
    });

    it("rejects other underscores and lower case starts", () => {
        expect(isValidMessageName("Point_Stamped")).toBe(false);
        expect(isValidMessageName("AddTwo_Request_Response")).toBe(false);
        expect(isValidMessageName("point")).toBe(false);
    });
});

describe("isValidConstantName", () => {
    it("accepts upper snake case", () => {
        expect(isValidConstantName("MAX_SIZE")).toBe(true);
    });

    it("rejects mixed case and trailing underscores", () => {
        expect(isValidConstantName("Max")).toBe(false);
        expect(isValidConstantName("MAX_")).toBe(false);
    });
});
