/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import {type Field, type MessageSpecification, type ServiceSpecification} from "./definition.js";
import {InvalidFieldDefinition} from "./errors.js";
import {tsTypes} from "./maps.js";
import {type Type} from "./types.js";
import {type FieldValue} from "./values.js";
import {interfaceImportPath, tabsInserter} from "./utils.js";

const zeroValues = new Map<string, string>([
    ["number", "0"],
    ["bigint", "0n"],
    ["boolean", "false"],
    ["string", "\"\""],
]);

interface InterfaceImport {
    key: string;
    pkgName: string;
    type: string;
    alias: string;
    path: string;
    needsFactory: boolean;
}

/**
 * Local identifiers of the imported interfaces, keyed by {@link qualifiedTypeName}.
 */
export type ImportedNames = ReadonlyMap<string, string>;

export function qualifiedTypeName(type: Type): string {
    return type.pkgName + "/" + type.namespace + "/" + type.type;
}

function localName(type: Type, names: ImportedNames): string {
    return names.get(qualifiedTypeName(type)) ?? type.type;
}

/**
 * `geometry_msgs` and `Point` give `GeometryMsgsPoint`.
 */
export function packageAlias(pkgName: string, type: string): string {
    return pkgName.split("_").map((part) => part.charAt(0).toUpperCase() + part.slice(1)).join("") + type;
}

function getPrimitiveTSType(type: Type): string {
    const tsType = tsTypes.get(type.type);
    if (tsType === undefined)
        throw new InvalidFieldDefinition("the primitive type '" + type.type + "' has no TypeScript counterpart");
    return tsType;
}

export function getTSType(type: Type, names: ImportedNames = new Map()): string {
    const tsType = type.isPrimitiveType() ? getPrimitiveTSType(type) : localName(type, names);
    return type.isArray ? tsType + "[]" : tsType;
}

export function valueLiteral(value: FieldValue): string {
    if (Array.isArray(value))
        return "[" + value.map((element) => valueLiteral(element)).join(", ") + "]";
    switch (typeof value) {
        case "bigint":
            return value + "n";
        case "string":
            return JSON.stringify(value);
        default:
            return String(value);
    }
}

export function getDefaultValue(field: Field, names: ImportedNames = new Map()): string {
    if (field.defaultValue !== null)
        return valueLiteral(field.defaultValue);

    const type = field.type;
    if (type.isDynamicArray())
        return "[]";
    const element = type.isPrimitiveType() ? zeroValues.get(getPrimitiveTSType(type)) ?? "undefined" : "create" + localName(type, names) + "()";
    if (type.isFixedSizeArray() && type.arraySize !== null) {
        if (type.isPrimitiveType())
            return "[" + Array<string>(type.arraySize).fill(element).join(", ") + "]";
        return "Array.from({length: " + type.arraySize + "}, () => " + element + ")";
    }
    return element;
}

function createHeader(source: string): string {
    return "// Generated by rosmsg-ts from " + source + ". Do not edit.\n\n";
}

function collectImports(pkgName: string, namespace: string, fields: Field[], localNames: string[]): InterfaceImport[] {
    const imports = new Map<string, InterfaceImport>();
    for (const field of fields) {
        const type = field.type;
        if (type.isPrimitiveType() || type.pkgName === null || type.namespace === null)
            continue;
        if (type.pkgName === pkgName && type.namespace === namespace && localNames.includes(type.type))
            continue;
        const needsFactory = !type.isDynamicArray();
        const key = qualifiedTypeName(type);
        const existing = imports.get(key);
        if (existing)
            existing.needsFactory = existing.needsFactory || needsFactory;
        else
            imports.set(key, {
                key: key,
                pkgName: type.pkgName,
                type: type.type,
                alias: type.type,
                path: interfaceImportPath(pkgName, namespace, type.pkgName, type.namespace, type.type),
                needsFactory: needsFactory
            });
    }

    // Types sharing a name with a local interface or with each other are imported under a package alias.
    const entries = [...imports.values()];
    for (const entry of entries) {
        const clashes = localNames.includes(entry.type) ||
            entries.some((other) => other !== entry && other.type === entry.type);
        if (clashes)
            entry.alias = packageAlias(entry.pkgName, entry.type);
    }
    return entries;
}

function importSpecifier(name: string, alias: string): string {
    return name === alias ? name : name + " as " + alias;
}

function createImports(imports: InterfaceImport[]): string {
    const modules = new Map<string, InterfaceImport[]>();
    for (const entry of imports)
        modules.set(entry.path, (modules.get(entry.path) ?? []).concat(entry));

    let text = "";
    const paths = [...modules.keys()].sort((a, b) => a.localeCompare(b));
    for (const importPath of paths) {
        const entries = (modules.get(importPath) ?? []).sort((a, b) => a.type.localeCompare(b.type));
        if (!entries.some((entry) => entry.needsFactory)) {
            text += "import type {" + entries.map((entry) => importSpecifier(entry.type, entry.alias)).join(", ") + "} from \"" + importPath + "\";\n";
            continue;
        }
        const specifiers: string[] = [];
        for (const entry of entries) {
            if (entry.needsFactory)
                specifiers.push(importSpecifier("create" + entry.type, "create" + entry.alias));
            specifiers.push("type " + importSpecifier(entry.type, entry.alias));
        }
        text += "import {" + specifiers.join(", ") + "} from \"" + importPath + "\";\n";
    }
    if (paths.length !== 0)
        text += "\n";
    return text;
}

function importedNames(imports: InterfaceImport[]): ImportedNames {
    const names = new Map<string, string>();
    for (const entry of imports)
        names.set(entry.key, entry.alias);
    return names;
}

function createMessage(spec: MessageSpecification, names: ImportedNames): string {
    const name = spec.msgName;
    let text = "";
    text += "/**\n";
    text += " * The " + name + " message of the " + spec.pkgName + " package.\n";
    text += " */\n";
    text += "export interface " + name + " {\n";
    for (const field of spec.fields) {
        text += tabsInserter(1) + "/** " + field.toString().replaceAll("*/", "*\\/") + " */\n";
        text += tabsInserter(1) + field.name + ": " + getTSType(field.type, names) + ";\n";
    }
    text += "}\n";

    if (spec.constants.length !== 0) {
        text += "\n";
        text += "export const " + name + "Constants = {\n";
        for (const constant of spec.constants)
            text += tabsInserter(1) + constant.name + ": " + valueLiteral(constant.value) + ",\n";
        text += "} as const;\n";
    }

    text += "\n";
    text += "/**\n";
    text += " * Creates a " + name + " populated with its default values.\n";
    text += " */\n";
    text += "export function create" + name + "(): " + name + " {\n";
    text += tabsInserter(1) + "return {\n";
    for (const field of spec.fields)
        text += tabsInserter(2) + field.name + ": " + getDefaultValue(field, names) + ",\n";
    text += tabsInserter(1) + "};\n";
    text += "}\n";
    return text;
}

export function createMessageFile(spec: MessageSpecification): string {
    const imports = collectImports(spec.pkgName, spec.namespace, spec.fields, [spec.msgName]);
    const names = importedNames(imports);
    let ts = createHeader(spec.pkgName + "/" + spec.namespace + "/" + spec.msgName + ".msg");
    ts += createImports(imports);
    ts += createMessage(spec, names);
    return ts;
}

export function createServiceFile(spec: ServiceSpecification): string {
    const request = spec.request;
    const response = spec.response;
    const imports = collectImports(spec.pkgName, "srv", request.fields.concat(response.fields), [request.msgName, response.msgName, spec.srvName]);
    const names = importedNames(imports);
    let ts = createHeader(spec.pkgName + "/srv/" + spec.srvName + ".srv");
    ts += createImports(imports);
    ts += createMessage(request, names);
    ts += "\n";
    ts += createMessage(response, names);
    ts += "\n";
    ts += "/**\n";
    ts += " * The " + spec.srvName + " service of the " + spec.pkgName + " package.\n";
    ts += " */\n";
    ts += "export interface " + spec.srvName + " {\n";
    ts += tabsInserter(1) + "request: " + request.msgName + ";\n";
    ts += tabsInserter(1) + "response: " + response.msgName + ";\n";
    ts += "}\n";
    return ts;
}

export function createIndexFile(modules: string[]): string {
    let ts = "";
    for (const module of [...modules].sort())
        ts += "export * from \"./" + module + ".js\";\n";
    return ts;
}
