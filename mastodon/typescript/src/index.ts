/**
 * Mastodon Integration Module
 *
 * Client for the Mastodon HTTP and streaming APIs, specialised to one
 * server generation.
 *
 * ## Features
 *
 * - Capability matrix across nine server generations
 * - Entities, endpoints and request parameters gated per generation
 * - Link-header pagination with origin-bound cursors
 * - Streaming timelines with optional reconnection
 * - Opt-in retry with exponential backoff
 *
 * ## Quick Start
 *
 * ```typescript
 * import { MastodonClient, MastodonConfigBuilder } from 'mastodon-versioned-client';
 *
 * const config = new MastodonConfigBuilder('2.9.1')
 *   .withBaseUrl('https://social.example')
 *   .withAccessToken(process.env.MASTODON_ACCESS_TOKEN ?? '')
 *   .build();
 *
 * const client = new MastodonClient(config);
 *
 * const status = await client.execute('statuses.create', {
 *   body: { status: 'Hello', visibility: 'unlisted' },
 * });
 *
 * // Not part of 2.9.1: rejected by the type checker
 * // await client.execute('announcements.list');
 * ```
 *
 * @module mastodon-versioned-client
 */

// Client
export { MastodonClient, RequestExecutor } from './client/index.js';
export type {
  ClientCapabilities,
  MastodonClientOptions,
  RequestExecutorOptions,
} from './client/index.js';

// Capabilities
export * from './capabilities/index.js';

// Configuration
export {
  MastodonConfigBuilder,
  SecretString,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from './config/index.js';
export type { MastodonConfig, RetryConfig } from './config/index.js';

// Entities
export {
  EntityModel,
  ENTITY_DEFINITIONS,
  isEntityName,
  isUnrecognized,
  describeZodError,
} from './entities/index.js';
export type {
  Codec,
  EntityDefinition,
  FieldKind,
  Unrecognized,
  ActiveEntityName,
  CodecValue,
  Entity,
  EntityName,
  VariantValue,
  Account,
  Source,
  MetadataField,
  Emoji,
  Status,
  Mention,
  Tag,
  TagHistory,
  Application,
  Attachment,
  AttachmentMeta,
  Card,
  Poll,
  PollOption,
  Notification,
  Relationship,
  Context,
  SearchResult,
  SearchResultV2,
  Filter,
  List,
  Instance,
  InstanceActivity,
  Report,
  AdminAccount,
  AdminReport,
  Announcement,
  AnnouncementReaction,
  AnnouncementReactionEvent,
  PushSubscription,
  PushAlerts,
  Marker,
  MarkerSet,
  ScheduledStatus,
  Conversation,
  FeaturedTag,
  Preferences,
  IdentityProof,
} from './entities/index.js';

// Requests
export { REQUEST_DEFINITIONS, RequestEncoder } from './requests/index.js';
export type { RequestInput, RequestName, EncodedBody } from './requests/index.js';

// Endpoints
export { ENDPOINTS, activeEndpoints, isEndpointName } from './endpoints/index.js';
export type {
  ActiveEndpointName,
  EndpointArgs,
  EndpointDefinition,
  EndpointName,
  EndpointResult,
  HttpMethod,
  PagedEndpointName,
  PagedItem,
} from './endpoints/index.js';

// Pagination
export { Page, PageCursor, parseLinkHeader } from './pagination/index.js';
export type { CursorDirection, PaginationLinks } from './pagination/index.js';

// Streaming
export {
  EventReader,
  ReconnectingEventReader,
  FetchStreamTransport,
  STREAM_EVENTS,
  STREAM_TIMELINES,
} from './streaming/index.js';
export type {
  ActiveStreamEventTag,
  ActiveStreamTimeline,
  NextEventOptions,
  ReaderState,
  ReconnectedEvent,
  ReconnectingStreamEvent,
  StreamConnection,
  StreamRequest,
  StreamTransport,
  StreamingEvent,
  UnrecognizedEvent,
} from './streaming/index.js';

// Transport
export { FetchTransport } from './transport/index.js';
export type { HttpRequest, HttpResponse, HttpTransport } from './transport/index.js';

// Errors
export {
  MastodonError,
  MastodonErrorCode,
  NetworkError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  RateLimitedError,
  ClientError,
  ServerError,
  MalformedResponseError,
  ValidationError,
  ConfigurationError,
  CapabilityMatrixError,
  InvalidCursorError,
  StreamError,
  StreamErrorKind,
  parseApiError,
  parseRateLimitReset,
  isMastodonError,
  isRetryableError,
} from './errors/index.js';
export type { MastodonApiErrorResponse, MastodonErrorOptions } from './errors/index.js';

// Resilience
export { RetryExecutor, computeBackoff, createRetryExecutor } from './resilience/index.js';
export type { RetryHooks } from './resilience/index.js';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  NoopTracer,
  InMemoryTracer,
  InMemorySpanContext,
  redactSensitive,
  resolveObservability,
} from './observability/index.js';
export type {
  ConsoleLoggerOptions,
  LogContext,
  Logger,
  LogRecord,
  MetricLabels,
  MetricsCollector,
  Observability,
  ObservabilityOptions,
  SpanAttributes,
  SpanStatus,
  SpanContext,
  Tracer,
} from './observability/index.js';

// Testing
export {
  MockHttpTransport,
  ScriptedConnection,
  ScriptedStreamTransport,
  sseLines,
} from './mocks/index.js';
export type { MockMatcher, MockResponse } from './mocks/index.js';
