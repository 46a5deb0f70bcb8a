/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import meow from "meow";
import {createArguments} from "./config.js";
import {GeneratorError} from "./errors.js";

import fs from "node:fs";
import * as path from "node:path";
import {fileURLToPath, pathToFileURL} from "node:url";

export type Generator = (generatorArgumentsFile: string) => number;
export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface CliFlags {
    generatorArgumentsFile?: string;
    init: boolean;
    force: boolean;
}

export const GENERATOR_MODULE = "rosmsg-ts/generator";

/**
 * The generator source next to this module, used when the package entry cannot be imported, as happens when the
 * tool runs from a checkout instead of an installed package.
 */
export const GENERATOR_FALLBACK_FILE = fileURLToPath(
    new URL("./generator" + path.extname(fileURLToPath(import.meta.url)), import.meta.url)
);

export const DEFAULT_ARGUMENTS_FILE = "generator_arguments.json";

export const helpText = `
    Usage
      $ rosmsg-ts --generator-arguments-file <path>
 
    Options
      --generator-arguments-file  [path:String] JSON file naming the package, its .msg/.srv files,
                                  their dependencies and the output directory. (required)
      --init                      create a generator arguments template at the given path
                                  (default: ./${DEFAULT_ARGUMENTS_FILE})
      --force                     (only with --init) overwrites an existing file (default: false)
 
    Examples
      $ rosmsg-ts --generator-arguments-file ./build/demo_msgs__arguments.json
      $ rosmsg-ts --init --generator-arguments-file ./demo_msgs__arguments.json
      
    Exit Status
      rosmsg-ts returns the following codes:
    
      - 0: 
        - Generation succeeded, no errors found. 
      - 1: 
        - Generation failed, invalid arguments or interface definitions found.
      - 2: 
        - Missing required flag or unexpected error occurred, fatal error.
`;

export function createCli(argv?: readonly string[]) {
    return meow(helpText, {
        ...(argv === undefined ? {} : {argv}),
        flags: {
            generatorArgumentsFile: {
                type: "string",
                isRequired: (flags) => !flags.init,
            },
            init: {
                type: "boolean",
                default: false,
            },
            force: {
                type: "boolean",
                default: false,
            },
        },
        autoHelp: true,
        autoVersion: true,
        importMeta: import.meta,
    });
}

function isGeneratorModule(value: unknown): value is { generateMsgAndSrv: Generator } {
    return typeof value === "object" &&
        value !== null &&
        "generateMsgAndSrv" in value &&
        typeof value.generateMsgAndSrv === "function";
}

export async function loadGenerator(
    importModule: ModuleImporter = (specifier) => import(specifier),
    fallbackFile: string = GENERATOR_FALLBACK_FILE
): Promise<Generator> {
    let generatorModule: unknown;
    try {
        generatorModule = await importModule(GENERATOR_MODULE);
    } catch (error) {
        if (!fs.existsSync(fallbackFile))
            throw error;
        generatorModule = await importModule(pathToFileURL(fallbackFile).href);
    }
    if (!isGeneratorModule(generatorModule))
        throw new TypeError("The module resolved for '" + GENERATOR_MODULE + "' does not export a generateMsgAndSrv function");
    return generatorModule.generateMsgAndSrv;
}

export async function run(flags: CliFlags, resolveGenerator: () => Promise<Generator> = loadGenerator): Promise<number | GeneratorError> {
    if (flags.init)
        return createArguments(flags.generatorArgumentsFile ?? path.join(process.cwd(), DEFAULT_ARGUMENTS_FILE), flags.force);
    if (flags.generatorArgumentsFile === undefined)
        return new GeneratorError(2, "", new Error("Missing required flag --generator-arguments-file"));

    const generate = await resolveGenerator();
    return generate(flags.generatorArgumentsFile);
}

/**
 * Runs the command line and hands the resulting exit code to `exit`. Uncaught errors end with code 2.
 */
export async function main(
    argv?: readonly string[],
    exit: (code: number) => void = (code) => process.exit(code),
    resolveGenerator: () => Promise<Generator> = loadGenerator
): Promise<void> {
    try {
        const result = await run(createCli(argv).flags, resolveGenerator);
        if (result instanceof GeneratorError) {
            if (result.message !== "")
                console.log(result.message);
            if (result.error !== null)
                console.error(result.error);
            exit(result.exitCode);
        } else
            exit(result);
    } catch (error) {
        console.error(error);
        exit(2);
    }
}
