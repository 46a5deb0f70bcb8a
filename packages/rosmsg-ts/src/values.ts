/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import {InvalidFieldDefinition, InvalidValue} from "./errors.js";
import {integerRanges, primitiveKinds, tsTypes} from "./maps.js";
import {Type} from "./types.js";
import {parseDecimalInteger} from "./utils.js";

export type PrimitiveValue = boolean | number | bigint | string;
export type FieldValue = PrimitiveValue | PrimitiveValue[];

const QUOTES = ["\"", "'"];
const TRUE_VALUES = ["true", "1"];
const FALSE_VALUES = ["false", "0"];
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

export function parseValueString(type: Type, valueString: string): FieldValue {
    if (type.isPrimitiveType() && !type.isArray)
        return parsePrimitiveValueString(type, valueString);

    if (!type.isPrimitiveType())
        throw new InvalidFieldDefinition("parsing string values into type '" + type + "' is not supported");

    if (!valueString.startsWith("[") || !valueString.endsWith("]"))
        throw new InvalidValue(type, valueString, "array value must start with '[' and end with ']'");
    const elementsString = valueString.slice(1, -1);

    // quoted string elements may contain the separator
    let valueStrings: string[];
    if (primitiveKinds.get(type.type) === "string")
        valueStrings = parseStringArrayValueString(elementsString);
    else
        valueStrings = elementsString.trim() !== "" ? elementsString.split(",") : [];

    if (type.arraySize !== null) {
        if (!type.isUpperBound && valueStrings.length !== type.arraySize)
            throw new InvalidValue(type, valueString, "array must have exactly " + type.arraySize + " elements, not " + valueStrings.length);
        if (type.isUpperBound && valueStrings.length > type.arraySize)
            throw new InvalidValue(type, valueString, "array must have not more than " + type.arraySize + " elements, not " + valueStrings.length);
    }

    const elementType = type.elementType();
    const values: PrimitiveValue[] = [];
    valueStrings.forEach((elementString, index) => {
        try {
            values.push(parsePrimitiveValueString(elementType, elementString.trim()));
        } catch (error) {
            if (error instanceof InvalidValue)
                throw new InvalidValue(type, valueString, "element " + index + " with " + error.message);
            throw error;
        }
    });
    return values;
}

/**
 * Splits the inside of a string array literal into its elements. Quoted elements lose their quotes and have
 * escaped quotes of the same kind unescaped; unquoted elements run up to the next comma.
 */
export function parseStringArrayValueString(elementsString: string): string[] {
    const values: string[] = [];
    let rest = elementsString;
    while (rest.length > 0) {
        rest = rest.trimStart();
        if (rest.length === 0)
            break;
        if (rest.startsWith(","))
            throw new InvalidValue("string", elementsString, "unexpected ',' at beginning of [" + rest + "]");

        const quote = QUOTES.find((candidate) => rest.startsWith(candidate));
        if (quote !== undefined) {
            const end = findMatchingEndQuote(rest, quote);
            if (end === -1)
                throw new InvalidValue("string", elementsString, "string [" + rest + "] incorrectly quoted");
            values.push(rest.slice(1, end).replaceAll("\\" + quote, quote));
            rest = rest.slice(end + 1);
        } else {
            const comma = rest.indexOf(",");
            if (comma === -1) {
                values.push(rest);
                rest = "";
            } else {
                values.push(rest.slice(0, comma));
                rest = rest.slice(comma);
            }
        }

        rest = rest.trimStart();
        if (rest.startsWith(","))
            rest = rest.slice(1);
    }
    return values;
}

/**
 * Index of the first quote after the opening one that is not preceded by a backslash, or -1.
 */
export function findMatchingEndQuote(text: string, quote: string): number {
    for (let i = 1; i < text.length; i++)
        if (text[i] === quote && text[i - 1] !== "\\")
            return i;
    return -1;
}

function unquote(primitiveType: string, valueString: string): string {
    for (const quote of QUOTES) {
        if (valueString.startsWith(quote) && valueString.endsWith(quote)) {
            const inner = valueString.slice(1, -1);
            if (new RegExp("(?<!\\\\)" + quote).test(inner))
                throw new InvalidValue(primitiveType, inner, "string inner quotes not properly escaped");
            return inner.replaceAll("\\" + quote, quote);
        }
    }
    return valueString;
}

export function parsePrimitiveValueString(type: Type, valueString: string): PrimitiveValue {
    if (!type.isPrimitiveType() || type.isArray)
        throw new TypeError("the passed type must be a non-array primitive type");
    const primitiveType = type.type;

    switch (primitiveKinds.get(primitiveType)) {
        case "boolean": {
            const lower = valueString.toLowerCase();
            if (!TRUE_VALUES.includes(lower) && !FALSE_VALUES.includes(lower))
                throw new InvalidValue(primitiveType, valueString, "must be either 'true' / '1' or 'false' / '0'");
            return TRUE_VALUES.includes(lower);
        }
        case "integer": {
            const range = integerRanges.get(primitiveType);
            if (range === undefined)
                break;
            const value = parseDecimalInteger(valueString);
            if (value === null || value < range.min || value > range.max)
                throw new InvalidValue(primitiveType, valueString, "must be a valid integer value >= " + range.min + " and <= " + range.max);
            return tsTypes.get(primitiveType) === "bigint" ? value : Number(value);
        }
        case "float": {
            const trimmed = valueString.trim();
            if (FLOAT_PATTERN.test(trimmed))
                return Number(trimmed);
            const special = SPECIAL_FLOAT_PATTERN.exec(trimmed);
            if (special === null)
                throw new InvalidValue(primitiveType, valueString, "must be a floating point number using '.' as the separator");
            if (special[2].toLowerCase() === "nan")
                return NaN;
            return special[1] === "-" ? -Infinity : Infinity;
        }
        case "string": {
            const value = unquote(primitiveType, valueString);
            if (type.stringUpperBound !== null && Array.from(value).length > type.stringUpperBound)
                throw new InvalidValue(type, value, "string must not exceed the maximum length of " + type.stringUpperBound + " characters");
            return value;
        }
        case "character": {
            const value = unquote(primitiveType, valueString);
            if (Array.from(value).length !== 1)
                throw new InvalidValue(primitiveType, valueString, "must be a single character");
            return value;
        }
    }
    throw new TypeError("unknown primitive type '" + primitiveType + "'");
}

export function valuesEqual(a: FieldValue | null, b: FieldValue | null): boolean {
    if (Array.isArray(a) && Array.isArray(b))
        return a.length === b.length && a.every((value, index) => value === b[index]);
    return a === b;
}

/**
 * Renders a value the way it appears in an interface definition, strings in single quotes.
 */
export function formatValue(value: FieldValue): string {
    if (Array.isArray(value))
        return "[" + value.map((element) => formatValue(element)).join(", ") + "]";
    if (typeof value === "string")
        return "'" + value + "'";
    return String(value);
}
