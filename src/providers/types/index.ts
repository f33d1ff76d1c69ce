/**
 * Types 统一导出
 */

export type {
    Role,
    TextContentPart,
    ImageUrlContentPart,
    InputContentPart,
    MessageContent,
    ChatMessage,
    ChatCompletionRequestBody,
    ResponsesInputPart,
    ResponsesInputBlock,
    ResponsesRequestBody,
    GenerationRequest,
    ChatCompletionResponse,
    ResponsesResponse,
    TokenUsage,
    AdapterResult,
    ModelResponseMetadata,
    ModelResponse,
    GenerateContentOptions,
} from './api';
export { chatCompletionResponseSchema, responsesResponseSchema } from './api';

export type { ProviderKind, EndpointShape, TemperatureConstraint, ModelCapabilities } from './capabilities';
export {
    PROVIDER_KINDS,
    fixedTemperature,
    rangeTemperature,
    validateTemperature,
    defaultTemperature,
    correctTemperature,
    describeTemperatureConstraint,
} from './capabilities';

export type { BaseProviderConfig, OpenAICompatibleConfig } from './config';
export { DEFAULT_OPENAI_BASE_URL } from './config';

export type { BackendErrorClassification, BackendErrorMetadata, AbortReasonCategory } from './errors';
export {
    ProviderError,
    ModelNotFoundError,
    InvalidParameterError,
    BackendError,
    BackendAuthError,
    BackendRateLimitError,
    BackendTransientError,
    BackendPermanentError,
    BackendAbortedError,
    classifyAbortReason,
    createErrorFromStatus,
    isBackendError,
    isRetryableBackendError,
} from './errors';
