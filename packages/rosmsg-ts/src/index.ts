/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

export {
    GeneratorError,
    InvalidFieldDefinition,
    InvalidResourceName,
    InvalidServiceSpecification,
    InvalidSpecification,
    InvalidValue,
    UnknownMessageType
} from "./errors.js";
export {
    isValidConstantName,
    isValidFieldName,
    isValidMessageName,
    isValidPackageName
} from "./names.js";
export {BaseType, Type} from "./types.js";
export {
    type FieldValue,
    findMatchingEndQuote,
    parsePrimitiveValueString,
    parseStringArrayValueString,
    parseValueString,
    type PrimitiveValue
} from "./values.js";
export {
    Constant,
    Field,
    type InterfaceSpecification,
    MessageSpecification,
    ServiceSpecification,
    validateFieldTypes
} from "./definition.js";
export {
    parseInterfaceFile,
    parseMessageFile,
    parseMessageString,
    parseServiceFile,
    parseServiceString
} from "./parser.js";
export {
    generateMsgAndSrv,
    type GeneratorArguments,
    loadGeneratorArguments,
    runGeneration
} from "./generator.js";
