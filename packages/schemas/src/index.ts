// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/schemas`
 * Purpose: Cross-service DTO schemas and the job description schema.
 * Scope: Re-exports only.
 * Invariants: Consumers validate with these schemas and use the z.infer types.
 * Side-effects: none
 * @public
 */

export {
  getJobSchemaFormatInstructions,
  getJobSchemaParser,
  Iso8601Schema,
  type JobDescription,
  JobDescriptionSchema,
  type Location,
  LocationSchema,
  type Meta,
  MetaSchema,
  Remote,
  RemoteSchema,
  type Skill,
  SkillSchema,
} from "./job";
export {
  type JobAlertCreate,
  JobAlertCreateSchema,
  type JobAlertUpdate,
  JobAlertUpdateSchema,
  type JobListingResponse,
  JobListingResponseSchema,
  type JobMatchResponse,
  JobMatchResponseSchema,
  type JobMatchWithListing,
  JobMatchWithListingSchema,
  type LinkedInCookieCreate,
  LinkedInCookieCreateSchema,
  type MarkNotifiedRequest,
  MarkNotifiedRequestSchema,
  type ProcessAlertRequest,
  ProcessAlertRequestSchema,
  type ProcessAlertResponse,
  ProcessAlertResponseSchema,
} from "./watcher";
