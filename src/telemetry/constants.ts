// Attribute, metric and event names emitted by the telemetry scopes. These
// are a stable contract with dashboards and collectors; do not rename.

export const INSTRUMENTATION_NAME = 'chatscope';

export const ERROR_TYPE_KEY = 'error.type';
export const SERVER_ADDRESS_KEY = 'server.address';
export const SERVER_PORT_KEY = 'server.port';

export const GEN_AI_SYSTEM_KEY = 'gen_ai.system';
export const GEN_AI_SYSTEM_VALUE = 'openai';
export const GEN_AI_OPERATION_NAME_KEY = 'gen_ai.operation.name';
export const GEN_AI_REQUEST_MODEL_KEY = 'gen_ai.request.model';
export const GEN_AI_REQUEST_MAX_TOKENS_KEY = 'gen_ai.request.max_tokens';
export const GEN_AI_REQUEST_TEMPERATURE_KEY = 'gen_ai.request.temperature';
export const GEN_AI_REQUEST_TOP_P_KEY = 'gen_ai.request.top_p';

export const GEN_AI_RESPONSE_ID_KEY = 'gen_ai.response.id';
export const GEN_AI_RESPONSE_MODEL_KEY = 'gen_ai.response.model';
export const GEN_AI_RESPONSE_FINISH_REASONS_KEY = 'gen_ai.response.finish_reasons';
export const GEN_AI_USAGE_INPUT_TOKENS_KEY = 'gen_ai.usage.input_tokens';
export const GEN_AI_USAGE_OUTPUT_TOKENS_KEY = 'gen_ai.usage.output_tokens';
export const GEN_AI_TOKEN_TYPE_KEY = 'gen_ai.token.type';

export const OPERATION_DURATION_METRIC = 'gen_ai.client.operation.duration';
export const TOKEN_USAGE_METRIC = 'gen_ai.client.token.usage';
export const STREAMS_STARTED_METRIC = 'gen_ai.client.streams.started';
export const STREAMS_COMPLETED_METRIC = 'gen_ai.client.streams.completed';

export const SYSTEM_MESSAGE_EVENT = 'gen_ai.system.message';
export const USER_MESSAGE_EVENT = 'gen_ai.user.message';
export const ASSISTANT_MESSAGE_EVENT = 'gen_ai.assistant.message';
export const TOOL_MESSAGE_EVENT = 'gen_ai.tool.message';
export const FUNCTION_MESSAGE_EVENT = 'gen_ai.function.message';
export const CHOICE_EVENT = 'gen_ai.choice';
export const EVENT_PAYLOAD_KEY = 'event.data';

export const REDACTED = 'REDACTED';

export type OperationName = 'chat' | 'embedding';
