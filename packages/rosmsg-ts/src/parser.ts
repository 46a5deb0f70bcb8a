/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import fs from "node:fs";
import * as path from "node:path";

import {
    Constant,
    Field,
    type InterfaceSpecification,
    MessageSpecification,
    ServiceSpecification
} from "./definition.js";
import {errorMessage, InvalidFieldDefinition, InvalidServiceSpecification, InvalidSpecification} from "./errors.js";
import {PRIMITIVE_TYPES} from "./maps.js";
import {
    COMMENT_DELIMITER,
    CONSTANT_SEPARATOR,
    SERVICE_REQUEST_MESSAGE_SUFFIX,
    SERVICE_REQUEST_RESPONSE_SEPARATOR,
    SERVICE_RESPONSE_MESSAGE_SUFFIX
} from "./names.js";
import {Type} from "./types.js";
import {consoleMessage} from "./utils.js";

const MULTI_WORD_TYPES = PRIMITIVE_TYPES
    .filter((type) => type.includes(" "))
    .sort((a, b) => b.length - a.length);

/**
 * Splits a definition line into its type token and the text after it. Multi-word primitives such as
 * `unsigned long long[4]` stay in one token.
 */
export function splitTypeToken(line: string): [string, string] {
    let offset = 0;
    for (const type of MULTI_WORD_TYPES) {
        if (line.startsWith(type) && /^([\s[]|$)/.test(line.slice(type.length))) {
            offset = type.length;
            break;
        }
    }
    return splitOnWhitespace(line, offset);
}

function splitOnWhitespace(text: string, offset: number = 0): [string, string] {
    const whitespace = /\s/.exec(text.slice(offset));
    if (whitespace === null)
        return [text, ""];
    const end = offset + whitespace.index;
    return [text.slice(0, end), text.slice(end).trimStart()];
}

export function parseMessageString(pkgName: string, msgName: string, messageString: string, namespace: string = "msg"): MessageSpecification {
    const fields: Field[] = [];
    const constants: Constant[] = [];

    for (const rawLine of messageString.split(/\r?\n/)) {
        let line = rawLine.trim();
        if (line === "")
            continue;
        const index = line.indexOf(COMMENT_DELIMITER);
        if (index === 0)
            continue;
        if (index !== -1)
            line = line.slice(0, index).trimEnd();

        const [typeString, rest] = splitTypeToken(line);
        if (rest === "")
            throw new InvalidFieldDefinition(line);

        try {
            const separator = rest.indexOf(CONSTANT_SEPARATOR);
            if (separator === -1) {
                const [fieldName, defaultValueString] = splitOnWhitespace(rest);
                fields.push(new Field(
                    new Type(typeString, pkgName, "msg"),
                    fieldName,
                    defaultValueString !== "" ? defaultValueString : null
                ));
            } else {
                constants.push(new Constant(
                    typeString,
                    rest.slice(0, separator).trimEnd(),
                    rest.slice(separator + 1).trimStart()
                ));
            }
        } catch (error) {
            consoleMessage("ERR", "Error processing '" + line + "' of '" + pkgName + "/" + msgName + "': '" + errorMessage(error) + "'");
            throw error;
        }
    }
    return new MessageSpecification(pkgName, namespace, msgName, fields, constants);
}

export function parseServiceString(pkgName: string, srvName: string, serviceString: string): ServiceSpecification {
    const lines = serviceString.split(/\r?\n/);
    const separatorIndices: number[] = [];
    lines.forEach((line, index) => {
        if (line === SERVICE_REQUEST_RESPONSE_SEPARATOR)
            separatorIndices.push(index);
    });
    if (separatorIndices.length === 0)
        throw new InvalidServiceSpecification("Could not find separator '" + SERVICE_REQUEST_RESPONSE_SEPARATOR + "' between request and response");
    if (separatorIndices.length !== 1)
        throw new InvalidServiceSpecification("Could not find unique separator '" + SERVICE_REQUEST_RESPONSE_SEPARATOR + "' between request and response");

    const separator = separatorIndices[0];
    const request = parseMessageString(pkgName, srvName + SERVICE_REQUEST_MESSAGE_SUFFIX, lines.slice(0, separator).join("\n"), "srv");
    const response = parseMessageString(pkgName, srvName + SERVICE_RESPONSE_MESSAGE_SUFFIX, lines.slice(separator + 1).join("\n"), "srv");
    return new ServiceSpecification(pkgName, srvName, request, response);
}

function interfaceName(interfaceFilename: string): string {
    return path.basename(interfaceFilename, path.extname(interfaceFilename));
}

export function parseMessageFile(pkgName: string, interfaceFilename: string): MessageSpecification {
    return parseMessageString(pkgName, interfaceName(interfaceFilename), fs.readFileSync(interfaceFilename, "utf8"));
}

export function parseServiceFile(pkgName: string, interfaceFilename: string): ServiceSpecification {
    return parseServiceString(pkgName, interfaceName(interfaceFilename), fs.readFileSync(interfaceFilename, "utf8"));
}

export function parseInterfaceFile(pkgName: string, interfaceFilename: string): InterfaceSpecification {
    const extension = path.extname(interfaceFilename);
    switch (extension) {
        case ".msg":
            return parseMessageFile(pkgName, interfaceFilename);
        case ".srv":
            return parseServiceFile(pkgName, interfaceFilename);
    }
    throw new InvalidSpecification("unsupported interface file extension '" + extension + "': " + interfaceFilename);
}
