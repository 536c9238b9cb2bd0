/**
 * Configured entry point binding the naming grammar and structured logging
 * to the type, value and specification operations.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/index.js';
import type { IdlError, IdlResult } from '../errors/index.js';
import type { NamingMode } from '../naming/index.js';
import {
  createConstant,
  parseMessageSpecification,
  parseServiceSpecification,
  renderSpecificationName,
  validateFieldTypes,
  type Constant,
  type MessageSpecification,
  type RawMessageDefinition,
  type RawServiceDefinition,
  type ServiceSpecification,
  type Specification,
} from '../specification/index.js';
import { formatType, parseType, type BaseType, type Type } from '../type-model/index.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { parseValue, type FieldValue } from '../values/index.js';

/**
 * Package and namespace that unqualified message names resolve against.
 */
export interface TypeContext {
  readonly packageName: string;
  readonly namespace: string;
}

/**
 * Options for creating an InterfaceParser.
 */
export interface InterfaceParserOptions {
  /** @defaultValue 'strict' */
  readonly naming?: NamingMode;
  /** @defaultValue the shared `idl` logger */
  readonly logger?: Logger;
}

function errorData(error: IdlError): Record<string, unknown> {
  return { kind: error.kind, message: error.message };
}

/**
 * Parses types, values and specifications under one naming grammar, logging
 * each outcome.
 *
 * Holds no state besides its settings; known message types are passed to
 * every {@link InterfaceParser.validateFieldTypes} call.
 *
 * @example
 * ```typescript
 * const parser = InterfaceParser.fromConfig(await loadConfig('idl.toml'));
 * const message = parser.parseMessage({
 *   packageName: 'geometry',
 *   namespace: 'msg',
 *   messageName: 'Point',
 *   fields: [{ type: 'float64', name: 'x' }, { type: 'float64', name: 'y' }],
 *   constants: [],
 * });
 * ```
 */
export class InterfaceParser {
  private readonly naming: NamingMode;
  private readonly logger: Logger;

  /**
   * Creates a new InterfaceParser.
   * @param options - Naming grammar and logger.
   */
  constructor(options: InterfaceParserOptions = {}) {
    this.naming = options.naming ?? 'strict';
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Creates a parser from a loaded configuration.
   *
   * @param config - The effective configuration.
   * @returns A parser using the configured naming mode and logger settings.
   */
  static fromConfig(config: Config): InterfaceParser {
    return new InterfaceParser({
      naming: config.naming.mode,
      logger: new Logger({ component: config.logging.component, debugMode: config.logging.debug }),
    });
  }

  /** The naming grammar in effect. */
  get namingMode(): NamingMode {
    return this.naming;
  }

  /**
   * Resolves a type string.
   *
   * @param typeString - The type string, optionally with an array suffix.
   * @param context - Package and namespace for unqualified message names.
   * @returns The resolved type or the failure.
   */
  parseType(typeString: string, context?: TypeContext): IdlResult<Type> {
    const result = parseType(
      typeString,
      context === undefined
        ? { naming: this.naming }
        : {
            naming: this.naming,
            contextPackageName: context.packageName,
            contextNamespace: context.namespace,
          }
    );
    if (result.success) {
      this.logger.debug('type_resolved', { input: typeString, type: formatType(result.value) });
    } else {
      this.logger.warn('type_rejected', { input: typeString, ...errorData(result.error) });
    }
    return result;
  }

  /**
   * Parses a literal against a resolved type.
   *
   * @param type - The target type.
   * @param literal - The literal text.
   * @returns The parsed value or the failure.
   */
  parseValue(type: Type, literal: string): IdlResult<FieldValue> {
    const result = parseValue(type, literal);
    if (!result.success) {
      this.logger.warn('value_rejected', {
        type: formatType(type),
        literal,
        ...errorData(result.error),
      });
    }
    return result;
  }

  /**
   * Creates a constant from its raw declaration parts.
   *
   * @param typeName - Primitive type name.
   * @param name - Constant name.
   * @param valueLiteral - Value literal.
   * @returns The constant or the failure.
   */
  parseConstant(typeName: string, name: string, valueLiteral: string): IdlResult<Constant> {
    const result = createConstant(typeName, name, valueLiteral);
    if (!result.success) {
      this.logger.warn('constant_rejected', { name, ...errorData(result.error) });
    }
    return result;
  }

  /**
   * Builds a message specification from raw declarations.
   *
   * @param definition - The raw declarations.
   * @returns The specification or the failure.
   */
  parseMessage(definition: RawMessageDefinition): IdlResult<MessageSpecification> {
    const result = parseMessageSpecification(definition, { naming: this.naming });
    if (result.success) {
      this.logger.debug('message_built', {
        message: renderSpecificationName(result.value),
        fields: result.value.fields.length,
        constants: result.value.constants.length,
      });
    } else {
      this.logger.warn('specification_rejected', {
        message: definition.messageName,
        ...errorData(result.error),
      });
    }
    return result;
  }

  /**
   * Builds a service specification from raw declarations.
   *
   * @param definition - The raw declarations.
   * @returns The specification or the failure.
   */
  parseService(definition: RawServiceDefinition): IdlResult<ServiceSpecification> {
    const result = parseServiceSpecification(definition, { naming: this.naming });
    if (result.success) {
      this.logger.debug('service_built', {
        service: renderSpecificationName(result.value),
        requestFields: result.value.request.fields.length,
        responseFields: result.value.response.fields.length,
      });
    } else {
      this.logger.warn('specification_rejected', {
        service: definition.serviceName,
        ...errorData(result.error),
      });
    }
    return result;
  }

  /**
   * Checks every referenced message type against the known types.
   *
   * @param spec - A message or service specification.
   * @param knownTypes - Base types of every known message.
   * @returns Success or the first unknown field type.
   */
  validateFieldTypes(spec: Specification, knownTypes: Iterable<BaseType>): IdlResult<void> {
    const result = validateFieldTypes(spec, knownTypes);
    if (!result.success) {
      this.logger.warn('unknown_field_type', {
        specification: renderSpecificationName(spec),
        ...errorData(result.error),
      });
    }
    return result;
  }
}
