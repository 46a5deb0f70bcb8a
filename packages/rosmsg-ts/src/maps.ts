/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

export const PRIMITIVE_TYPES: readonly string[] = [
    // IDL Types
    "short",
    "unsigned short",
    "long",
    "unsigned long",
    "long long",
    "unsigned long long",
    "float",
    "double",
    "long double",
    "char",
    "wchar",
    "boolean",
    "octet",
    "int8",
    "uint8",
    "int16",
    "uint16",
    "int32",
    "uint32",
    "int64",
    "uint64",
    "string",
    "wstring",

    // ROS Aliases
    "bool",
    "byte",
    "float32",
    "float64",
];

export const BOUNDED_STRING_TYPES: readonly string[] = ["string", "wstring"];

export type PrimitiveKind = "boolean" | "integer" | "float" | "string" | "character";

export interface IntegerRange {
    min: bigint;
    max: bigint;
}

function signed(bits: bigint): IntegerRange {
    return {min: -(2n ** (bits - 1n)), max: 2n ** (bits - 1n) - 1n};
}

function unsigned(bits: bigint): IntegerRange {
    return {min: 0n, max: 2n ** bits - 1n};
}

export const integerRanges = new Map<string, IntegerRange>([
    ["int8", signed(8n)],
    ["char", signed(8n)],
    ["uint8", unsigned(8n)],
    ["octet", unsigned(8n)],
    ["byte", unsigned(8n)],
    ["int16", signed(16n)],
    ["short", signed(16n)],
    ["uint16", unsigned(16n)],
    ["unsigned short", unsigned(16n)],
    ["int32", signed(32n)],
    ["long", signed(32n)],
    ["uint32", unsigned(32n)],
    ["unsigned long", unsigned(32n)],
    ["int64", signed(64n)],
    ["long long", signed(64n)],
    ["uint64", unsigned(64n)],
    ["unsigned long long", unsigned(64n)],
]);

export const primitiveKinds = new Map<string, PrimitiveKind>([
    ["boolean", "boolean"],
    ["bool", "boolean"],
    ["float", "float"],
    ["double", "float"],
    ["long double", "float"],
    ["float32", "float"],
    ["float64", "float"],
    ["string", "string"],
    ["wstring", "string"],
    ["wchar", "character"],
    ...[...integerRanges.keys()].map((type): [string, PrimitiveKind] => [type, "integer"]),
]);

export const tsTypes = new Map<string, string>([
    // Integer Types
    ["int8", "number"],
    ["char", "number"],
    ["uint8", "number"],
    ["octet", "number"],
    ["byte", "number"],
    ["int16", "number"],
    ["short", "number"],
    ["uint16", "number"],
    ["unsigned short", "number"],
    ["int32", "number"],
    ["long", "number"],
    ["uint32", "number"],
    ["unsigned long", "number"],
    ["int64", "bigint"],
    ["long long", "bigint"],
    ["uint64", "bigint"],
    ["unsigned long long", "bigint"],

    // Floating Point Types
    ["float", "number"],
    ["double", "number"],
    ["long double", "number"],
    ["float32", "number"],
    ["float64", "number"],

    // Boolean Types
    ["boolean", "boolean"],
    ["bool", "boolean"],

    // Character Types
    ["string", "string"],
    ["wstring", "string"],
    ["wchar", "string"],
]);

export function isPrimitiveType(type: string): boolean {
    return PRIMITIVE_TYPES.includes(type);
}
