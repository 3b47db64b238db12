/**
 * @fileoverview Typed Trello API client
 * @module @trellis/trello
 *
 * Entities backed by attribute maps with dirty tracking, lazily resolved
 * associations, OAuth 1.0a or key/token auth, and pluggable transports.
 *
 * @example
 * ```typescript
 * import { Board, Client, Configuration } from '@trellis/trello';
 *
 * const client = new Client({ configuration: Configuration.fromEnv() });
 * const board = await client.find(Board, 'b1');
 * const cards = await board.cards;
 * ```
 */

// Client and configuration
export { Client, API_BASE, type ClientOptions } from './client.js';
export { Configuration, configurationSchema, type ConfigurationOptions } from './configuration.js';
export {
  BasicAuthPolicy,
  OAuthPolicy,
  NullAuthPolicy,
  authPolicyFor,
  type AuthPolicy,
  type OAuthCredentials,
} from './authorization.js';
export { authorizeUrl, publicKeyUrl, type AuthorizeUrlOptions } from './authorize-url.js';

// Transport
export {
  buildRequest,
  withParams,
  withHeaders,
  isJsonObject,
  TrelloResponse,
  type TrelloRequest,
  type HttpVerb,
  type JsonValue,
  type JsonObject,
  type JsonPrimitive,
  type RequestParams,
} from './net/request.js';
export {
  TransportRegistry,
  createDefaultRegistry,
  DEFAULT_TIMEOUT_MS,
  HTTP_CLIENT_PRIORITY,
  type HttpClientName,
  type Transport,
  type TransportCandidate,
  type TransportOptions,
} from './net/transport.js';
export { AxiosTransport, type AxiosTransportOptions } from './net/axios-transport.js';
export { FetchTransport, type FetchTransportOptions } from './net/fetch-transport.js';

// Entities and associations
export {
  defineEntity,
  type Entity,
  type EntityAttributes,
  type EntityClass,
  type EntityDefinition,
} from './entity.js';
export { BasicData, idOf } from './basic-data.js';
export {
  Association,
  SingleAssociation,
  HasOne,
  OptionalHasOne,
  HasMany,
  hasOne,
  hasMany,
  type HasOneOptions,
  type HasManyOptions,
  type TargetThunk,
} from './associations/association.js';
export { AssociationProxy, MultiAssociation } from './associations/proxy.js';
export { CacheSlot, type SlotState } from './associations/cache-slot.js';
export { fetchOne, fetchMany } from './associations/fetcher.js';

// Models
export { Action, actionSchema, type ActionAttributes } from './models/action.js';
export { Attachment, attachmentSchema, type AttachmentAttributes } from './models/attachment.js';
export { Board, boardSchema, type BoardAttributes, type BoardMemberType } from './models/board.js';
export { Card, cardSchema, type CardAttributes } from './models/card.js';
export {
  Checklist,
  checklistSchema,
  type ChecklistAttributes,
  type CheckItem,
} from './models/checklist.js';
export {
  CustomField,
  customFieldSchema,
  CUSTOM_FIELD_TYPES,
  type CustomFieldAttributes,
  type CustomFieldOption,
  type CustomFieldType,
} from './models/custom-field.js';
export {
  CustomFieldItem,
  customFieldItemSchema,
  customFieldItemBody,
  type CustomFieldItemAttributes,
  type CustomFieldValue,
} from './models/custom-field-item.js';
export {
  Label,
  labelSchema,
  LABEL_COLORS,
  type LabelAttributes,
  type LabelColor,
} from './models/label.js';
export { List, listSchema, type ListAttributes } from './models/list.js';
export { Member, memberSchema, type MemberAttributes } from './models/member.js';
export {
  Notification,
  notificationSchema,
  type NotificationAttributes,
} from './models/notification.js';
export {
  Organization,
  organizationSchema,
  type OrganizationAttributes,
} from './models/organization.js';
export {
  Token,
  tokenSchema,
  type TokenAttributes,
  type TokenPermission,
} from './models/token.js';
export { Webhook, webhookSchema, type WebhookAttributes } from './models/webhook.js';
