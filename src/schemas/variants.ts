/**
 * Content Variant Schemas
 *
 * The content store has a fixed schema: each record variant declares the
 * attributes it carries. Upserts are validated against these schemas, and
 * consumers re-parse attributes with them when they need typed access.
 */

import { z } from 'zod';
import { ISODateSchema, ISO8601TimestampSchema } from './common.js';

// ============================================================================
// Variant Attribute Schemas
// ============================================================================

export const OrganizationAttributesSchema = z.object({
  name: z.string().min(1),
  url: z.string().url().optional(),
  logoUrl: z.string().url().optional(),
  description: z.string().optional(),
  /** Organizations that financially support the site */
  isPartner: z.boolean().default(false),
});

export type OrganizationAttributes = z.infer<typeof OrganizationAttributesSchema>;

export const PostingAttributesSchema = z.object({
  title: z.string().min(1),
  company: z.string().min(1),
  url: z.string().url(),
  location: z.string().optional(),
  remote: z.boolean().default(false),
  postedOn: ISODateSchema.optional(),
  tags: z.array(z.string()).default([]),
  /** Feed or board the posting came from */
  source: z.string().min(1),
});

export type PostingAttributes = z.infer<typeof PostingAttributesSchema>;

export const EventAttributesSchema = z.object({
  title: z.string().min(1),
  startsAt: ISO8601TimestampSchema,
  endsAt: ISO8601TimestampSchema.optional(),
  venue: z.string().optional(),
  url: z.string().url().optional(),
  hosts: z.array(z.string()).default([]),
});

export type EventAttributes = z.infer<typeof EventAttributesSchema>;

export const MemberAttributesSchema = z.object({
  displayName: z.string().min(1),
  joinedAt: ISO8601TimestampSchema.optional(),
  avatarUrl: z.string().url().optional(),
  isBot: z.boolean().default(false),
  roles: z.array(z.string()).default([]),
});

export type MemberAttributes = z.infer<typeof MemberAttributesSchema>;

export const SubscriptionTypeSchema = z.enum([
  'free',
  'finaid',
  'individual',
  'trial',
  'partner',
  'student',
]);

export const SubscriptionIntervalSchema = z.enum(['month', 'year']);

export const SubscriptionActivityTypeSchema = z.enum([
  'trial_start',
  'trial_end',
  'order',
  'deactivation',
]);

export const SubscriptionAttributesSchema = z.object({
  accountId: z.string().min(1),
  activity: SubscriptionActivityTypeSchema,
  happenedAt: ISO8601TimestampSchema,
  type: SubscriptionTypeSchema.nullable().default(null),
  interval: SubscriptionIntervalSchema.nullable().default(null),
  coupon: z.string().nullable().default(null),
});

export type SubscriptionAttributes = z.infer<typeof SubscriptionAttributesSchema>;

/**
 * Raw entry of a syndication feed, as fetched. Normalizing stages read
 * these and produce domain variants such as postings.
 */
export const FeedEntryAttributesSchema = z.object({
  feedId: z.string().min(1),
  entryId: z.string().min(1),
  title: z.string().min(1),
  url: z.string().url(),
  summary: z.string().optional(),
  contentHtml: z.string().optional(),
  authorName: z.string().optional(),
  publishedAt: ISO8601TimestampSchema.optional(),
  tags: z.array(z.string()).default([]),
});

export type FeedEntryAttributes = z.infer<typeof FeedEntryAttributesSchema>;

// ============================================================================
// Variant Registry
// ============================================================================

export const VariantNameSchema = z.enum([
  'organization',
  'posting',
  'event',
  'member',
  'subscription',
  'feed_entry',
]);

export type VariantName = z.infer<typeof VariantNameSchema>;

export const VARIANT_NAMES: readonly VariantName[] = VariantNameSchema.options;

export const VARIANT_SCHEMAS = {
  organization: OrganizationAttributesSchema,
  posting: PostingAttributesSchema,
  event: EventAttributesSchema,
  member: MemberAttributesSchema,
  subscription: SubscriptionAttributesSchema,
  feed_entry: FeedEntryAttributesSchema,
} satisfies Record<VariantName, z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>>;

export type VariantAttributes<V extends VariantName> = z.infer<(typeof VARIANT_SCHEMAS)[V]>;

/**
 * Type guard for variant names coming from the CLI or persisted data
 */
export function isVariantName(value: string): value is VariantName {
  return VariantNameSchema.safeParse(value).success;
}

/**
 * Validate attributes against the schema of a variant
 */
export function parseVariantAttributes(
  variant: VariantName,
  input: unknown
): z.SafeParseReturnType<unknown, Record<string, unknown>> {
  const schema: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown> =
    VARIANT_SCHEMAS[variant];
  return schema.safeParse(input);
}
