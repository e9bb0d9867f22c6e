/**
 * Content negotiation barrel export
 */

export {
    MediaTypeRegistry,
    createMediaTypeRegistry,
    WILDCARD_MEDIA_TYPE,
    type NamedFormatter,
    type RegisteredFormat,
    type MediaTypeRegistryOptions,
} from './media-type-registry.js';
export { parseAccept, parseQuality, type AcceptCandidate } from './accept-parser.js';
export { selectFormat, negotiateAccept, resolveCandidate, type NegotiatedFormat } from './format-selector.js';
export {
    decodeInbound,
    resolveDeclaredType,
    passthrough,
    type BodyParser,
    type DecodedBody,
} from './inbound-decoder.js';
export {
    negotiated,
    erase,
    attachPayload,
    peekPayload,
    takePayload,
    PLACEHOLDER_STATUS,
    type ErasedPayload,
} from './erased-payload.js';
export { finalizeResponse, type FinalizeResult } from './reencoder.js';
export { diagnosticResponse, renderError } from './responses.js';
export * from './errors.js';
