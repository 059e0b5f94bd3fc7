// src/core/validator.ts

/**
 * @fileoverview
 * The decoder accepts any unrecognized key as an extension. This module layers the `x-` naming
 * convention on top, for callers that want it enforced.
 */

import { EXTENSION_PREFIX } from './constants.js';
import { Extensions } from './codec/partitioned.js';
import { inlineValue, ReferenceOr } from './codec/reference.js';
import { ExtensionNameError } from './errors.js';
import { OpenApiDocument, Operation, Parameter, PathItem, Server } from './model/index.js';
import { appendPointer } from './utils/index.js';

function collect(extensions: Extensions, pointer: string, violations: string[]): void {
    for (const key of extensions.keys()) {
        if (!key.startsWith(EXTENSION_PREFIX)) {
            violations.push(appendPointer(pointer, key));
        }
    }
}

function visitServers(servers: readonly Server[] | undefined, pointer: string, violations: string[]): void {
    servers?.forEach((server, index) => collect(server.extensions, appendPointer(appendPointer(pointer, 'servers'), index), violations));
}

function visitParameters(
    parameters: readonly ReferenceOr<Parameter>[] | undefined,
    pointer: string,
    violations: string[],
): void {
    parameters?.forEach((node, index) => {
        const parameter = inlineValue(node);
        if (parameter) collect(parameter.extensions, appendPointer(appendPointer(pointer, 'parameters'), index), violations);
    });
}

function visitOperation(operation: Operation, pointer: string, violations: string[]): void {
    collect(operation.extensions, pointer, violations);
    visitParameters(operation.parameters, pointer, violations);
    visitServers(operation.servers, pointer, violations);
}

function visitPathItem(node: ReferenceOr<PathItem>, pointer: string, violations: string[]): void {
    const item = inlineValue(node);
    if (!item) return;

    collect(item.extensions, pointer, violations);
    visitServers(item.servers, pointer, violations);
    visitParameters(item.parameters, pointer, violations);
    for (const [method, operation] of item) {
        visitOperation(operation, appendPointer(pointer, method), violations);
    }
}

/**
 * Lists the JSON Pointers of every extension key, at any level of the decoded document,
 * that does not start with `x-`.
 */
export function findExtensionViolations(document: OpenApiDocument): string[] {
    const violations: string[] = [];

    collect(document.extensions, '', violations);
    visitServers(document.servers, '', violations);

    if (document.paths) {
        collect(document.paths.extensions, '/paths', violations);
        for (const [pathTemplate, node] of document.paths) {
            visitPathItem(node, appendPointer('/paths', pathTemplate), violations);
        }
    }

    for (const [name, node] of document.webhooks ?? []) {
        visitPathItem(node, appendPointer('/webhooks', name), violations);
    }

    return violations;
}

/**
 * Enforces the extension naming convention over a decoded document.
 *
 * @throws {ExtensionNameError} listing every offending location.
 */
export function validateExtensionNames(document: OpenApiDocument): void {
    const violations = findExtensionViolations(document);
    if (violations.length > 0) {
        throw new ExtensionNameError(
            `Extension keys must start with '${EXTENSION_PREFIX}'. Offending locations: ${violations.join(', ')}`,
            violations,
        );
    }
}
