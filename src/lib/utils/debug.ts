/**
 * Debug logging for acme-authorizer
 *
 * Namespaced loggers on top of the `debug` package, enabled through the
 * DEBUG environment variable:
 *
 * DEBUG=acme-authorizer:* - All debug output
 * DEBUG=acme-authorizer:poll - Only status polling
 * DEBUG=acme-authorizer:http,acme-authorizer:nonce - Transport traffic
 *
 * Output is silent unless DEBUG selects a namespace.
 */

import debug from 'debug';

export const DEBUG_NAMESPACE = 'acme-authorizer';

const createDebugger = (scope: string) => debug(`${DEBUG_NAMESPACE}:${scope}`);

export const debugOrchestrator = createDebugger('orchestrator');
export const debugRegistration = createDebugger('registration');
export const debugChallenge = createDebugger('challenge');
export const debugPoll = createDebugger('poll');
export const debugCertificate = createDebugger('certificate');
export const debugHttp = createDebugger('http');
export const debugNonce = createDebugger('nonce');
