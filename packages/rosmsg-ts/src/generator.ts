/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import fs from "node:fs";
import * as path from "node:path";
import {z} from "zod";

import {
    type InterfaceSpecification,
    MessageSpecification,
    providedMessageTypes,
    validateFieldTypes
} from "./definition.js";
import {GeneratorError, InvalidSpecification, InvalidValue} from "./errors.js";
import {isValidPackageName} from "./names.js";
import {parseInterfaceFile} from "./parser.js";
import {type BaseType} from "./types.js";
import {consoleMessage} from "./utils.js";
import {createIndexFile, createMessageFile, createServiceFile} from "./writer.js";

const generatorArgumentsSchema = z.object({
    package_name: z.string().min(1),
    output_dir: z.string().min(1),
    ros_interface_files: z.array(z.string().min(1)),
    ros_interface_dependencies: z.array(z.string().min(1)).default([]),
});

export interface InterfaceDependency {
    packageName: string;
    file: string;
}

export interface GeneratorArguments {
    packageName: string;
    outputDir: string;
    interfaceFiles: string[];
    interfaceDependencies: InterfaceDependency[];
}

function parseDependency(entry: string, baseDir: string): InterfaceDependency | GeneratorError {
    const separator = entry.indexOf(":");
    if (separator <= 0 || separator === entry.length - 1)
        return new GeneratorError(1, "", new Error("Invalid interface dependency '" + entry + "', expected '<package>:<path>'."));
    return {
        packageName: entry.slice(0, separator),
        file: path.resolve(baseDir, entry.slice(separator + 1)),
    };
}

export function loadGeneratorArguments(generatorArgumentsFile: string): GeneratorArguments | GeneratorError {
    if (!fs.existsSync(generatorArgumentsFile))
        return new GeneratorError(1, "", new Error("The generator arguments file '" + generatorArgumentsFile + "' does not exist."));

    let json: unknown;
    try {
        json = JSON.parse(fs.readFileSync(generatorArgumentsFile).toString());
    } catch (error) {
        if (error instanceof SyntaxError)
            return new GeneratorError(1, "", new Error("The generator arguments file is not valid JSON: " + error.message));
        throw error;
    }

    const result = generatorArgumentsSchema.safeParse(json);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => issue.path.join(".") + ": " + issue.message);
        return new GeneratorError(1, "", new Error("Invalid generator arguments: " + issues.join("; ")));
    }
    const params = result.data;
    if (!isValidPackageName(params.package_name))
        return new GeneratorError(1, "", new Error("The package name '" + params.package_name + "' is not valid."));

    const baseDir = path.dirname(path.resolve(generatorArgumentsFile));
    const interfaceDependencies: InterfaceDependency[] = [];
    for (const entry of params.ros_interface_dependencies) {
        const dependency = parseDependency(entry, baseDir);
        if (dependency instanceof GeneratorError)
            return dependency;
        interfaceDependencies.push(dependency);
    }

    return {
        packageName: params.package_name,
        outputDir: path.resolve(baseDir, params.output_dir),
        interfaceFiles: params.ros_interface_files.map((file) => path.resolve(baseDir, file)),
        interfaceDependencies: interfaceDependencies,
    };
}

function parseInterfaces(args: GeneratorArguments): InterfaceSpecification[] | GeneratorError {
    for (const file of args.interfaceFiles.concat(args.interfaceDependencies.map((dependency) => dependency.file)))
        if (!fs.existsSync(file))
            return new GeneratorError(1, "", new Error("The interface file '" + file + "' does not exist."));

    try {
        const knownMsgTypes: BaseType[] = [];
        for (const dependency of args.interfaceDependencies)
            knownMsgTypes.push(...providedMessageTypes(parseInterfaceFile(dependency.packageName, dependency.file)));

        const specs: InterfaceSpecification[] = [];
        for (const file of args.interfaceFiles) {
            const spec = parseInterfaceFile(args.packageName, file);
            for (const baseType of providedMessageTypes(spec)) {
                if (knownMsgTypes.some((known) => known.equals(baseType)))
                    throw new InvalidSpecification("the interface '" + baseType + "' is defined more than once");
                knownMsgTypes.push(baseType);
            }
            specs.push(spec);
        }

        for (const spec of specs)
            validateFieldTypes(spec, knownMsgTypes);
        return specs;
    } catch (error) {
        if (error instanceof InvalidSpecification || error instanceof InvalidValue)
            return new GeneratorError(1, "", error);
        throw error;
    }
}

export function runGeneration(args: GeneratorArguments): void | GeneratorError {
    const specs = parseInterfaces(args);
    if (specs instanceof GeneratorError)
        return specs;

    const packageDir = path.join(args.outputDir, args.packageName);
    fs.mkdirSync(packageDir, {recursive: true});
    const modules: string[] = [];
    for (const spec of specs) {
        let namespace: string;
        let name: string;
        let ts: string;
        if (spec instanceof MessageSpecification) {
            namespace = spec.namespace;
            name = spec.msgName;
            ts = createMessageFile(spec);
        } else {
            namespace = "srv";
            name = spec.srvName;
            ts = createServiceFile(spec);
        }
        fs.mkdirSync(path.join(packageDir, namespace), {recursive: true});
        fs.writeFileSync(path.join(packageDir, namespace, name + ".ts"), ts);
        modules.push(namespace + "/" + name);
    }
    fs.writeFileSync(path.join(packageDir, "index.ts"), createIndexFile(modules));
    consoleMessage("INF", "Generated " + modules.length + " interface file(s) for the " + args.packageName + " package in " + packageDir);
}

/**
 * Generates TypeScript sources for the interfaces listed in a generator arguments file and returns the exit
 * code the process should end with.
 */
export function generateMsgAndSrv(generatorArgumentsFile: string): number {
    const args = loadGeneratorArguments(generatorArgumentsFile);
    if (args instanceof GeneratorError)
        return reportError(args);
    const result = runGeneration(args);
    if (result instanceof GeneratorError)
        return reportError(result);
    return 0;
}

function reportError(error: GeneratorError): number {
    if (error.message !== "")
        consoleMessage("ERR", error.message);
    if (error.error !== null)
        consoleMessage("ERR", error.error.message);
    return error.exitCode;
}
