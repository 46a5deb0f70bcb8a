/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import {InvalidFieldDefinition, InvalidResourceName} from "./errors.js";
import {BOUNDED_STRING_TYPES, isPrimitiveType} from "./maps.js";
import {
    ARRAY_UPPER_BOUND_TOKEN,
    isValidMessageName,
    isValidPackageName,
    NAMESPACE_SEPARATOR,
    STRING_UPPER_BOUND_TOKEN
} from "./names.js";
import {parseDecimalInteger} from "./utils.js";

export class BaseType {
    pkgName: string | null;
    namespace: string | null;
    type: string;
    stringUpperBound: number | null;

    constructor(typeString: string, contextPackageName?: string, contextNamespace?: string) {
        const boundedString = BOUNDED_STRING_TYPES.find((type) => typeString.startsWith(type + STRING_UPPER_BOUND_TOKEN));
        if (isPrimitiveType(typeString)) {
            this.pkgName = null;
            this.namespace = null;
            this.type = typeString;
            this.stringUpperBound = null;
        } else if (boundedString !== undefined) {
            const bound = parseDecimalInteger(typeString.slice(boundedString.length + STRING_UPPER_BOUND_TOKEN.length));
            if (bound === null || bound <= 0n)
                throw new InvalidFieldDefinition("the upper bound of the string type '" + typeString + "' must be a valid integer value > 0");
            this.pkgName = null;
            this.namespace = null;
            this.type = boundedString;
            this.stringUpperBound = Number(bound);
        } else {
            const parts = typeString.split(NAMESPACE_SEPARATOR);
            let pkgName: string;
            let namespace: string;
            let type: string;
            if (parts.length === 3) {
                pkgName = parts[0];
                namespace = parts[1];
                type = parts[2];
            } else if (parts.length === 1 && contextPackageName !== undefined && contextNamespace !== undefined) {
                pkgName = contextPackageName;
                namespace = contextNamespace;
                type = typeString;
            } else
                throw new InvalidResourceName(typeString);

            if (!isValidPackageName(pkgName))
                throw new InvalidResourceName(pkgName);
            if (!isValidMessageName(type))
                throw new InvalidResourceName(type);
            this.pkgName = pkgName;
            this.namespace = namespace;
            this.type = type;
            this.stringUpperBound = null;
        }
    }

    isPrimitiveType(): boolean {
        return this.pkgName === null;
    }

    equals(other: BaseType | null | undefined): boolean {
        if (!other)
            return false;
        return this.pkgName === other.pkgName &&
            this.type === other.type &&
            this.stringUpperBound === other.stringUpperBound;
    }

    /**
     * The type without any array suffix, in the form `Type` parses back.
     */
    baseTypeString(): string {
        if (this.pkgName !== null)
            return this.pkgName + NAMESPACE_SEPARATOR + this.namespace + NAMESPACE_SEPARATOR + this.type;
        if (this.stringUpperBound !== null)
            return this.type + STRING_UPPER_BOUND_TOKEN + this.stringUpperBound;
        return this.type;
    }

    toString(): string {
        if (this.pkgName !== null)
            return this.pkgName + "/" + this.type;
        return this.baseTypeString();
    }
}

interface ArraySuffix {
    baseTypeString: string;
    isArray: boolean;
    arraySize: number | null;
    isUpperBound: boolean;
}

function splitArraySuffix(typeString: string): ArraySuffix {
    if (!typeString.endsWith("]"))
        return {baseTypeString: typeString, isArray: false, arraySize: null, isUpperBound: false};

    const index = typeString.lastIndexOf("[");
    if (index === -1)
        throw new InvalidFieldDefinition("the type '" + typeString + "' ends with ']' but does not contain a '['");

    let sizeString = typeString.slice(index + 1, -1);
    let arraySize: number | null = null;
    let isUpperBound = false;
    if (sizeString !== "") {
        isUpperBound = sizeString.startsWith(ARRAY_UPPER_BOUND_TOKEN);
        if (isUpperBound)
            sizeString = sizeString.slice(ARRAY_UPPER_BOUND_TOKEN.length);
        const size = parseDecimalInteger(sizeString);
        if (size === null || size <= 0n)
            throw new InvalidFieldDefinition("the size of array type '" + typeString + "' must be a valid integer value > 0 optionally prefixed with '" + ARRAY_UPPER_BOUND_TOKEN + "' if it is only an upper bound");
        arraySize = Number(size);
    }
    return {baseTypeString: typeString.slice(0, index), isArray: true, arraySize, isUpperBound};
}

export class Type extends BaseType {
    isArray: boolean;
    arraySize: number | null;
    isUpperBound: boolean;

    constructor(typeString: string, contextPackageName?: string, contextNamespace?: string) {
        const suffix = splitArraySuffix(typeString);
        super(suffix.baseTypeString, contextPackageName, contextNamespace);
        this.isArray = suffix.isArray;
        this.arraySize = suffix.arraySize;
        this.isUpperBound = suffix.isUpperBound;
    }

    isDynamicArray(): boolean {
        return this.isArray && (this.arraySize === null || this.isUpperBound);
    }

    isFixedSizeArray(): boolean {
        return this.isArray && this.arraySize !== null && !this.isUpperBound;
    }

    /**
     * The non-array type of the elements, or a copy of this type when it is not an array.
     */
    elementType(): Type {
        return new Type(this.baseTypeString());
    }

    equals(other: BaseType | null | undefined): boolean {
        if (!(other instanceof Type))
            return false;
        return super.equals(other) &&
            this.isArray === other.isArray &&
            this.arraySize === other.arraySize &&
            this.isUpperBound === other.isUpperBound;
    }

    toString(): string {
        let text = super.toString();
        if (this.isArray) {
            text += "[";
            if (this.isUpperBound)
                text += ARRAY_UPPER_BOUND_TOKEN;
            if (this.arraySize !== null)
                text += this.arraySize;
            text += "]";
        }
        return text;
    }
}
