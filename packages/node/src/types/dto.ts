/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as base-unit decimal strings and are parsed to bigint
 * here; range and address checks stay with the domain.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "Expected a base-unit decimal integer string")
  .transform((value) => BigInt(value));

export const AddressSchema = z.string().min(1);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Ledger DTOs
// =============================================================================

export const TransferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ApproveSchema = z.object({
  spender: AddressSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const TransferFromSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: AmountSchema,
});

export type TransferFromDto = z.infer<typeof TransferFromSchema>;

// =============================================================================
// Launch DTOs
// =============================================================================

export const BurnSchema = z.object({
  amount: AmountSchema,
});

export type BurnDto = z.infer<typeof BurnSchema>;

// =============================================================================
// Vesting DTOs
// =============================================================================

export const ScheduleVestingSchema = z.object({
  beneficiary: AddressSchema,
  amount: AmountSchema,
});

export type ScheduleVestingDto = z.infer<typeof ScheduleVestingSchema>;

// =============================================================================
// Mission Log DTOs
// =============================================================================

export const LogMissionSchema = z.object({
  value: AmountSchema,
  tag: z.string().min(1),
});

export type LogMissionDto = z.infer<typeof LogMissionSchema>;

export const MissionLogIndexSchema = z.coerce.number().int().min(0);

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
