// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/schemas/watcher`
 * Purpose: Wire contracts between the job assistant and the job watcher service.
 * Scope: Request/response DTO schemas for alerts, cookies, listings and matches. Does not contain business logic.
 * Invariants:
 *   - Field names are snake_case on the wire
 *   - IDs are UUIDs; timestamps are coerced to Date
 *   - Contract changes land here first; both services import from this module
 * Side-effects: none
 * Links: src/index.ts
 * @public
 */

import { z } from "zod";

const KeywordsSchema = z.union([z.string(), z.array(z.string())]);

// ---------------------------------------------------------------------------
// Alerts
// ---------------------------------------------------------------------------

export const JobAlertCreateSchema = z.object({
  alert_name: z.string().nullish(),
  keywords: KeywordsSchema,
  sources: z.array(z.string()).nullish(),
  location: z.string().nullish(),
  check_interval_minutes: z.number().int().default(5),
  filters: z.record(z.string(), z.unknown()).nullish(),
});

export const JobAlertUpdateSchema = z.object({
  alert_name: z.string().nullish(),
  keywords: KeywordsSchema.nullish(),
  sources: z.array(z.string()).nullish(),
  location: z.string().nullish(),
  check_interval_minutes: z.number().int().nullish(),
  filters: z.record(z.string(), z.unknown()).nullish(),
  is_active: z.boolean().nullish(),
});

// ---------------------------------------------------------------------------
// LinkedIn session
// ---------------------------------------------------------------------------

export const LinkedInCookieCreateSchema = z.object({
  li_at: z.string(),
  jsession_id: z.string().nullish(),
  additional_cookies: z.record(z.string(), z.string()).nullish(),
});

// ---------------------------------------------------------------------------
// Listings and matches
// ---------------------------------------------------------------------------

export const JobListingResponseSchema = z.object({
  id: z.string().uuid(),
  external_id: z.string(),
  source: z.string(),
  source_job_id: z.string(),
  url: z.string(),
  title: z.string(),
  company: z.string().nullable(),
  location: z.string().nullable(),
  description: z.string().nullable(),
  snippet: z.string().nullable(),
  posted_at: z.coerce.date().nullable(),
  salary_min: z.number().nullable(),
  salary_max: z.number().nullable(),
  salary_currency: z.string().nullable(),
  employment_type: z.string().nullable(),
  remote_type: z.string().nullable(),
  content_hash: z.string(),
  embedding_model: z.string().nullish(),
  first_seen_at: z.coerce.date(),
  last_seen_at: z.coerce.date(),
  created_at: z.coerce.date(),
});

export const JobMatchResponseSchema = z.object({
  id: z.string().uuid(),
  job_alert_id: z.string().uuid(),
  job_listing_id: z.string().uuid(),
  user_id: z.string().uuid(),
  relevance_score: z.number().int(),
  key_strengths: z.array(z.string()),
  potential_concerns: z.array(z.string()),
  strategic_value: z.string().nullable(),
  recommended_action: z.string().nullable(),
  reasoning: z.string().nullable(),
  is_notified: z.boolean(),
  created_at: z.coerce.date(),
});

export const JobMatchWithListingSchema = JobMatchResponseSchema.extend({
  job_listing: JobListingResponseSchema,
});

// ---------------------------------------------------------------------------
// Processing
// ---------------------------------------------------------------------------

export const ProcessAlertRequestSchema = z.object({
  alert_id: z.string().uuid(),
  min_relevance_score: z.number().int().default(60),
});

export const ProcessAlertResponseSchema = z.object({
  alert_id: z.string(),
  alert_name: z.string(),
  scraped_jobs: z.number().int(),
  new_jobs: z.number().int(),
  matches: z.number().int(),
  notifications_sent: z.number().int(),
  errors: z.array(z.string()),
});

export const MarkNotifiedRequestSchema = z.object({
  match_id: z.string().uuid(),
});

export type JobAlertCreate = z.infer<typeof JobAlertCreateSchema>;
export type JobAlertUpdate = z.infer<typeof JobAlertUpdateSchema>;
export type LinkedInCookieCreate = z.infer<typeof LinkedInCookieCreateSchema>;
export type JobListingResponse = z.infer<typeof JobListingResponseSchema>;
export type JobMatchResponse = z.infer<typeof JobMatchResponseSchema>;
export type JobMatchWithListing = z.infer<typeof JobMatchWithListingSchema>;
export type ProcessAlertRequest = z.infer<typeof ProcessAlertRequestSchema>;
export type ProcessAlertResponse = z.infer<typeof ProcessAlertResponseSchema>;
export type MarkNotifiedRequest = z.infer<typeof MarkNotifiedRequestSchema>;
