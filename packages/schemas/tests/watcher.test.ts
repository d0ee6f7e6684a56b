// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/schemas/tests/watcher.test`
 * Purpose: Watcher DTO defaults, required fields and coercions.
 * Side-effects: none
 * Links: src/watcher.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  JobAlertCreateSchema,
  JobAlertUpdateSchema,
  JobListingResponseSchema,
  JobMatchWithListingSchema,
  LinkedInCookieCreateSchema,
  MarkNotifiedRequestSchema,
  ProcessAlertRequestSchema,
  ProcessAlertResponseSchema,
} from "../src/watcher";

const LISTING_ID = "3f1c2d4e-5a6b-4c7d-8e9f-0a1b2c3d4e5f";
const ALERT_ID = "a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d";
const MATCH_ID = "b2c3d4e5-f6a7-4b8c-9d0e-1f2a3b4c5d6e";
const USER_ID = "c3d4e5f6-a7b8-4c9d-8e1f-2a3b4c5d6e7f";

const listing = {
  id: LISTING_ID,
  external_id: "linkedin:123",
  source: "linkedin",
  source_job_id: "123",
  url: "https://jobs.example.com/123",
  title: "Dev",
  company: null,
  location: null,
  description: null,
  snippet: null,
  posted_at: null,
  salary_min: null,
  salary_max: null,
  salary_currency: null,
  employment_type: null,
  remote_type: null,
  content_hash: "abc",
  first_seen_at: "2024-05-01T10:00:00Z",
  last_seen_at: "2024-05-02T10:00:00Z",
  created_at: "2024-05-01T10:00:00Z",
};

describe("JobAlertCreateSchema", () => {
  it("accepts keywords as a string or a list", () => {
    expect(JobAlertCreateSchema.parse({ keywords: "python developer" }).keywords).toBe(
      "python developer"
    );
    expect(JobAlertCreateSchema.parse({ keywords: ["python", "django"] }).keywords).toEqual([
      "python",
      "django",
    ]);
  });

  it("defaults the check interval to five minutes", () => {
    expect(JobAlertCreateSchema.parse({ keywords: "x" }).check_interval_minutes).toBe(5);
  });

  it("requires keywords", () => {
    expect(JobAlertCreateSchema.safeParse({}).success).toBe(false);
  });
});

describe("JobAlertUpdateSchema", () => {
  it("accepts a partial update", () => {
    expect(JobAlertUpdateSchema.parse({ check_interval_minutes: 30 })).toEqual({
      check_interval_minutes: 30,
    });
  });
});

describe("LinkedInCookieCreateSchema", () => {
  it("requires li_at", () => {
    expect(LinkedInCookieCreateSchema.safeParse({ jsession_id: "sess" }).success).toBe(false);
  });

  it("accepts additional cookies", () => {
    const cookies = LinkedInCookieCreateSchema.parse({
      li_at: "test-cookie",
      additional_cookies: { lang: "en-us" },
    });
    expect(cookies.additional_cookies?.lang).toBe("en-us");
  });
});

describe("JobListingResponseSchema", () => {
  it("coerces timestamps to Date", () => {
    const parsed = JobListingResponseSchema.parse(listing);
    expect(parsed.first_seen_at).toEqual(new Date("2024-05-01T10:00:00Z"));
    expect(parsed.embedding_model).toBeUndefined();
  });

  it("rejects a non-UUID id", () => {
    expect(JobListingResponseSchema.safeParse({ ...listing, id: "42" }).success).toBe(false);
  });

  it("requires nullable fields to be present", () => {
    const { company: _company, ...withoutCompany } = listing;
    expect(JobListingResponseSchema.safeParse(withoutCompany).success).toBe(false);
  });
});

describe("JobMatchWithListingSchema", () => {
  it("embeds the listing", () => {
    const match = JobMatchWithListingSchema.parse({
      id: MATCH_ID,
      job_alert_id: ALERT_ID,
      job_listing_id: LISTING_ID,
      user_id: USER_ID,
      relevance_score: 85,
      key_strengths: ["TypeScript", "Postgres"],
      potential_concerns: [],
      strategic_value: null,
      recommended_action: "apply",
      reasoning: null,
      is_notified: false,
      created_at: "2024-05-03T08:30:00Z",
      job_listing: listing,
    });
    expect(match.job_listing.title).toBe("Dev");
    expect(match.key_strengths).toHaveLength(2);
  });
});

describe("ProcessAlertRequestSchema", () => {
  it("defaults the minimum relevance score to 60", () => {
    expect(ProcessAlertRequestSchema.parse({ alert_id: ALERT_ID })).toEqual({
      alert_id: ALERT_ID,
      min_relevance_score: 60,
    });
  });

  it("requires alert_id", () => {
    expect(ProcessAlertRequestSchema.safeParse({ min_relevance_score: 75 }).success).toBe(false);
  });
});

describe("ProcessAlertResponseSchema", () => {
  it("parses counts and errors", () => {
    const response = ProcessAlertResponseSchema.parse({
      alert_id: ALERT_ID,
      alert_name: "Backend roles",
      scraped_jobs: 10,
      new_jobs: 4,
      matches: 3,
      notifications_sent: 2,
      errors: [],
    });
    expect(response.matches).toBe(3);
    expect(response.errors).toEqual([]);
  });
});

describe("MarkNotifiedRequestSchema", () => {
  it("validates the match id", () => {
    expect(MarkNotifiedRequestSchema.parse({ match_id: MATCH_ID }).match_id).toBe(MATCH_ID);
    expect(MarkNotifiedRequestSchema.safeParse({ match_id: "nope" }).success).toBe(false);
  });
});
