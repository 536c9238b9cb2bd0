/**
 * Service specifications: a request/response message pair.
 *
 * @packageDocumentation
 */

import { success, type IdlResult } from '../errors/index.js';
import {
  SERVICE_REQUEST_MESSAGE_SUFFIX,
  SERVICE_RESPONSE_MESSAGE_SUFFIX,
} from '../naming/index.js';
import { DISPLAY_SEPARATOR } from '../type-model/index.js';
import {
  messageSpecificationEquals,
  parseMessageSpecification,
  type MessageOptions,
  type MessageSpecification,
  type RawConstantDefinition,
  type RawFieldDefinition,
} from './message.js';

/**
 * A validated service definition.
 */
export interface ServiceSpecification {
  readonly kind: 'service';
  readonly packageName: string;
  readonly serviceName: string;
  readonly request: MessageSpecification;
  readonly response: MessageSpecification;
}

/**
 * Raw declarations of one half of a service.
 */
export interface RawServiceMessage {
  readonly fields: readonly RawFieldDefinition[];
  readonly constants: readonly RawConstantDefinition[];
}

/**
 * The raw declarations of one service definition file, already split at its
 * request/response separator.
 */
export interface RawServiceDefinition {
  readonly packageName: string;
  readonly namespace: string;
  readonly serviceName: string;
  readonly request: RawServiceMessage;
  readonly response: RawServiceMessage;
}

/**
 * Pairs a request and a response message into a service specification.
 *
 * @param packageName - Package of the service.
 * @param serviceName - Name of the service.
 * @param request - The request message.
 * @param response - The response message.
 * @returns The service specification.
 */
export function createServiceSpecification(
  packageName: string,
  serviceName: string,
  request: MessageSpecification,
  response: MessageSpecification
): ServiceSpecification {
  return { kind: 'service', packageName, serviceName, request, response };
}

/**
 * Builds a service specification from raw declarations. The request and
 * response messages are named `<service>_Request` and `<service>_Response`.
 *
 * @param definition - The raw declarations.
 * @param options - Naming grammar.
 * @returns The specification or the first failure, request first.
 */
export function parseServiceSpecification(
  definition: RawServiceDefinition,
  options: MessageOptions = {}
): IdlResult<ServiceSpecification> {
  const { packageName, namespace, serviceName } = definition;

  const request = parseMessageSpecification(
    {
      packageName,
      namespace,
      messageName: serviceName + SERVICE_REQUEST_MESSAGE_SUFFIX,
      ...definition.request,
    },
    options
  );
  if (!request.success) {
    return request;
  }

  const response = parseMessageSpecification(
    {
      packageName,
      namespace,
      messageName: serviceName + SERVICE_RESPONSE_MESSAGE_SUFFIX,
      ...definition.response,
    },
    options
  );
  if (!response.success) {
    return response;
  }

  return success(createServiceSpecification(packageName, serviceName, request.value, response.value));
}

/**
 * Renders the identity of a service as `<package>/<service>`.
 */
export function renderServiceName(service: ServiceSpecification): string {
  return `${service.packageName}${DISPLAY_SEPARATOR}${service.serviceName}`;
}

/**
 * Structural equality of identity and both messages.
 */
export function serviceSpecificationEquals(a: ServiceSpecification, b: ServiceSpecification): boolean {
  return (
    a.packageName === b.packageName &&
    a.serviceName === b.serviceName &&
    messageSpecificationEquals(a.request, b.request) &&
    messageSpecificationEquals(a.response, b.response)
  );
}
