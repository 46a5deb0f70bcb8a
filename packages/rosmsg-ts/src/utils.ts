/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import {SERVICE_REQUEST_MESSAGE_SUFFIX, SERVICE_RESPONSE_MESSAGE_SUFFIX} from "./names.js";

import * as path from "node:path";

export type LogLevel = "DBG" | "INF" | "WRN" | "ERR" | "CRT";

const levelColors = new Map<LogLevel, string>([
    ["DBG", "\x1b[96m"],
    ["INF", "\x1b[92m"],
    ["WRN", "\x1b[33m"],
    ["ERR", "\x1b[91m"],
    ["CRT", "\x1b[31m"],
]);

export function consoleMessage(level: LogLevel, message: string) {
    const color = levelColors.get(level) ?? "\x1b[0m";
    console.log(new Date(Date.now()).toISOString() + " " + color + level + "\x1b[0m " + message);
}

export function tabsInserter(tabNumber: number): string {
    let tabs: string = "";
    for (let i = 0; i < tabNumber; i++)
        tabs += "\t";
    return tabs;
}

/**
 * Parses a base-10 integer, surrounding whitespace and a sign allowed.
 * Returns null for anything else, including the empty string.
 */
export function parseDecimalInteger(text: string): bigint | null {
    if (!/^\s*[+-]?\d+\s*$/.test(text))
        return null;
    return BigInt(text.trim());
}

/**
 * The generated module declaring `type`. Request and response messages live in their service's module.
 */
export function interfaceModuleName(namespace: string, type: string): string {
    if (namespace === "srv")
        for (const suffix of [SERVICE_REQUEST_MESSAGE_SUFFIX, SERVICE_RESPONSE_MESSAGE_SUFFIX])
            if (type.endsWith(suffix) && type.length > suffix.length)
                return type.slice(0, -suffix.length);
    return type;
}

/**
 * The module specifier a generated file under `<fromPackage>/<fromNamespace>/` uses to import the
 * module generated for `<toPackage>/<toNamespace>/<type>`.
 */
export function interfaceImportPath(fromPackage: string, fromNamespace: string, toPackage: string, toNamespace: string, type: string): string {
    const relative = path.posix.relative(
        path.posix.join(fromPackage, fromNamespace),
        path.posix.join(toPackage, toNamespace, interfaceModuleName(toNamespace, type) + ".js")
    );
    return relative.startsWith(".") ? relative : "./" + relative;
}

export function findDuplicates(names: string[]): string[] {
    const duplicates = new Set<string>();
    for (const name of names)
        if (names.indexOf(name) !== names.lastIndexOf(name))
            duplicates.add(name);
    return [...duplicates].sort();
}
