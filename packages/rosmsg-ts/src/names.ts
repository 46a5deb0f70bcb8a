/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

export const NAMESPACE_SEPARATOR = "::";
export const COMMENT_DELIMITER = "#";
export const CONSTANT_SEPARATOR = "=";
export const ARRAY_UPPER_BOUND_TOKEN = "<=";
export const STRING_UPPER_BOUND_TOKEN = "<=";

export const SERVICE_REQUEST_RESPONSE_SEPARATOR = "---";
export const SERVICE_REQUEST_MESSAGE_SUFFIX = "_Request";
export const SERVICE_RESPONSE_MESSAGE_SUFFIX = "_Response";

const VALID_PACKAGE_NAME_PATTERN = /^[a-z]([a-z0-9_]?[a-z0-9]+)*$/;
const VALID_FIELD_NAME_PATTERN = /^[a-z]([a-z0-9_]?[a-z0-9]+)*$/;
const VALID_MESSAGE_NAME_PATTERN = /^[A-Z][A-Za-z0-9]*$/;
const VALID_CONSTANT_NAME_PATTERN = /^[A-Z]([A-Z0-9_]?[A-Z0-9]+)*$/;

const SAMPLE_PREFIX = "Sample_";

export function isValidPackageName(name: string): boolean {
    return VALID_PACKAGE_NAME_PATTERN.test(name);
}

export function isValidFieldName(name: string): boolean {
    return VALID_FIELD_NAME_PATTERN.test(name);
}

/**
 * Message names may carry a `Sample_` prefix and one service suffix, neither of which is matched against the
 * message name pattern.
 */
export function isValidMessageName(name: string): boolean {
    if (name.startsWith(SAMPLE_PREFIX))
        name = name.slice(SAMPLE_PREFIX.length);
    for (const suffix of [SERVICE_REQUEST_MESSAGE_SUFFIX, SERVICE_RESPONSE_MESSAGE_SUFFIX]) {
        if (name.endsWith(suffix)) {
            name = name.slice(0, -suffix.length);
            break;
        }
    }
    return VALID_MESSAGE_NAME_PATTERN.test(name);
}

export function isValidConstantName(name: string): boolean {
    return VALID_CONSTANT_NAME_PATTERN.test(name);
}
