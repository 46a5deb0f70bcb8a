/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import {InvalidFieldDefinition, InvalidResourceName, InvalidSpecification, UnknownMessageType} from "./errors.js";
import {isPrimitiveType} from "./maps.js";
import {isValidConstantName, isValidFieldName, NAMESPACE_SEPARATOR} from "./names.js";
import {BaseType, Type} from "./types.js";
import {type FieldValue, formatValue, parsePrimitiveValueString, parseValueString, type PrimitiveValue, valuesEqual} from "./values.js";
import {findDuplicates} from "./utils.js";

export class Constant {
    type: string;
    name: string;
    value: PrimitiveValue;

    constructor(primitiveType: string, name: string, valueString: string) {
        if (!isPrimitiveType(primitiveType))
            throw new InvalidFieldDefinition("the constant type '" + primitiveType + "' must be a primitive type");
        if (!isValidConstantName(name))
            throw new InvalidResourceName("the constant name '" + name + "' is not valid");
        this.type = primitiveType;
        this.name = name;
        this.value = parsePrimitiveValueString(new Type(primitiveType), valueString);
    }

    equals(other: Constant | null | undefined): boolean {
        if (!other)
            return false;
        return this.type === other.type && this.name === other.name && this.value === other.value;
    }

    toString(): string {
        return this.type + " " + this.name + "=" + formatValue(this.value);
    }
}

export class Field {
    type: Type;
    name: string;
    defaultValue: FieldValue | null;

    constructor(type: Type, name: string, defaultValueString: string | null = null) {
        if (!isValidFieldName(name))
            throw new InvalidResourceName("the field name '" + name + "' is not valid");
        this.type = type;
        this.name = name;
        this.defaultValue = defaultValueString === null ? null : parseValueString(type, defaultValueString);
    }

    equals(other: Field | null | undefined): boolean {
        if (!other)
            return false;
        return this.type.equals(other.type) &&
            this.name === other.name &&
            valuesEqual(this.defaultValue, other.defaultValue);
    }

    toString(): string {
        let text = this.type + " " + this.name;
        if (this.defaultValue !== null)
            text += " " + formatValue(this.defaultValue);
        return text;
    }
}

export class MessageSpecification {
    baseType: BaseType;
    pkgName: string;
    namespace: string;
    msgName: string;
    fields: Field[];
    constants: Constant[];

    constructor(pkgName: string, namespace: string, msgName: string, fields: Field[], constants: Constant[]) {
        this.baseType = new BaseType(pkgName + NAMESPACE_SEPARATOR + namespace + NAMESPACE_SEPARATOR + msgName);
        this.pkgName = pkgName;
        this.namespace = namespace;
        this.msgName = msgName;

        this.fields = [...fields];
        const duplicateFieldNames = findDuplicates(this.fields.map((field) => field.name));
        if (duplicateFieldNames.length !== 0)
            throw new InvalidSpecification("the message '" + this.baseType + "' contains duplicate field names: " + duplicateFieldNames.join(", "));

        this.constants = [...constants];
        const duplicateConstantNames = findDuplicates(this.constants.map((constant) => constant.name));
        if (duplicateConstantNames.length !== 0)
            throw new InvalidSpecification("the message '" + this.baseType + "' contains duplicate constant names: " + duplicateConstantNames.join(", "));
    }

    equals(other: MessageSpecification | null | undefined): boolean {
        if (!other)
            return false;
        return this.baseType.equals(other.baseType) &&
            this.fields.length === other.fields.length &&
            this.fields.every((field, index) => field.equals(other.fields[index])) &&
            this.constants.length === other.constants.length &&
            this.constants.every((constant, index) => constant.equals(other.constants[index]));
    }
}

export class ServiceSpecification {
    baseType: BaseType;
    pkgName: string;
    srvName: string;
    request: MessageSpecification;
    response: MessageSpecification;

    constructor(pkgName: string, srvName: string, request: MessageSpecification, response: MessageSpecification) {
        this.baseType = new BaseType(pkgName + NAMESPACE_SEPARATOR + "srv" + NAMESPACE_SEPARATOR + srvName);
        this.pkgName = pkgName;
        this.srvName = srvName;
        this.request = request;
        this.response = response;
    }

    equals(other: ServiceSpecification | null | undefined): boolean {
        if (!other)
            return false;
        return this.baseType.equals(other.baseType) &&
            this.request.equals(other.request) &&
            this.response.equals(other.response);
    }
}

export type InterfaceSpecification = MessageSpecification | ServiceSpecification;

/**
 * The message types an interface makes available to others; a service contributes its request and response.
 */
export function providedMessageTypes(spec: InterfaceSpecification): BaseType[] {
    if (spec instanceof MessageSpecification)
        return [spec.baseType];
    return [spec.request.baseType, spec.response.baseType];
}

export function validateFieldTypes(spec: InterfaceSpecification, knownMsgTypes: BaseType[]) {
    let specType: string;
    let fields: Field[];
    if (spec instanceof MessageSpecification) {
        specType = "Message";
        fields = spec.fields;
    } else {
        specType = "Service";
        fields = spec.request.fields.concat(spec.response.fields);
    }
    for (const field of fields) {
        if (field.type.isPrimitiveType())
            continue;
        if (!knownMsgTypes.some((known) => known.equals(field.type)))
            throw new UnknownMessageType(specType + " interface '" + spec.baseType + "' contains an unknown field type: " + field);
    }
}
