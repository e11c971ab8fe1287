/**
 * Type barrel — re-exports all public types from @ignition/node.
 */

// DTOs
export {
  AmountSchema,
  AddressSchema,
  PaginationQuerySchema,
  TransferSchema,
  ApproveSchema,
  TransferFromSchema,
  BurnSchema,
  ScheduleVestingSchema,
  LogMissionSchema,
  MissionLogIndexSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  TransferDto,
  ApproveDto,
  TransferFromDto,
  BurnDto,
  ScheduleVestingDto,
  LogMissionDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Views
export {
  toNotificationView,
  toReceiptView,
  toAllocationView,
  toBurnView,
  toGrantView,
  toStatusView,
  toVestingView,
  toMissionLogEntryView,
} from "./views.js";
export type { NotificationView, ReceiptView } from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";
