/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

import {GeneratorError} from "./errors.js";

import fs from "node:fs";
import * as path from "node:path";

export const argumentsTemplate = {
    package_name: "my_msgs",
    output_dir: "generated",
    ros_interface_files: [] as string[],
    ros_interface_dependencies: [] as string[],
};

export function createArguments(file: string, force: boolean): GeneratorError {
    if (fs.existsSync(file) && !force)
        return new GeneratorError(1, "", new Error("A generator arguments file already exists. Add the --force flag if you want to overwrite it."));

    fs.mkdirSync(path.dirname(file), {recursive: true});
    fs.writeFileSync(file, JSON.stringify(argumentsTemplate, null, "\t") + "\n");
    return new GeneratorError(0, "Generator arguments file successfully created!", null);
}
