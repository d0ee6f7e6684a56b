// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@phoenix/schemas/job`
 * Purpose: Job description schema used to structure scraped or pasted job ads via the LLM.
 * Scope: Zod schema, inferred types and LangChain parser helpers. Does not call a model.
 * Invariants:
 *   - Every field is optional and nullable; unknown keys are kept (passthrough)
 *   - `date` accepts YYYY, YYYY-MM or YYYY-MM-DD
 *   - Field descriptions feed the LLM format instructions
 * Side-effects: none
 * Links: src/index.ts
 * @public
 */

import { StructuredOutputParser } from "@langchain/core/output_parsers";
import { z } from "zod";

const ISO_8601_PARTIAL_DATE =
  /^([1-2][0-9]{3}-[0-1][0-9]-[0-3][0-9]|[1-2][0-9]{3}-[0-1][0-9]|[1-2][0-9]{3})$/;

export const Iso8601Schema = z
  .string()
  .regex(ISO_8601_PARTIAL_DATE, "Expected YYYY, YYYY-MM or YYYY-MM-DD")
  .describe(
    "Similar to the standard date type, but each section after the year is optional. e.g. 2014-06-29 or 2023-04"
  );

export const RemoteSchema = z.enum(["Full", "Hybrid", "None"]);
export const Remote = RemoteSchema.enum;
export type Remote = z.infer<typeof RemoteSchema>;

export const LocationSchema = z
  .object({
    address: z
      .string()
      .nullish()
      .describe(
        "To add multiple address lines, use \\n. For example, 1234 Glücklichkeit Straße\\nHinterhaus 5. Etage li."
      ),
    postalCode: z.string().nullish(),
    city: z.string().nullish(),
    countryCode: z
      .string()
      .nullish()
      .describe("code as per ISO-3166-1 ALPHA-2, e.g. US, AU, IN"),
    region: z
      .string()
      .nullish()
      .describe(
        "The general region where you live. Can be a US state, or a province, for instance."
      ),
  })
  .passthrough();

export const SkillSchema = z
  .object({
    name: z.string().nullish().describe("e.g. Web Development"),
    level: z.string().nullish().describe("e.g. Master"),
    keywords: z
      .array(z.string())
      .nullish()
      .describe("List some keywords pertaining to this skill"),
  })
  .passthrough();

export const MetaSchema = z
  .object({
    canonical: z
      .string()
      .url()
      .nullish()
      .describe("URL (as per RFC 3986) to latest version of this document"),
    version: z
      .string()
      .nullish()
      .describe("A version field which follows semver - e.g. v1.0.0"),
    lastModified: z
      .string()
      .nullish()
      .describe("Using ISO 8601 with YYYY-MM-DDThh:mm:ss"),
  })
  .passthrough();

export const JobDescriptionSchema = z
  .object({
    title: z.string().nullish().describe("e.g. Web Developer"),
    company: z.string().nullish().describe("Microsoft"),
    type: z.string().nullish().describe("Full-time, part-time, contract, etc."),
    date: Iso8601Schema.nullish(),
    description: z.string().nullish().describe("Write a short description about the job"),
    location: LocationSchema.nullish(),
    remote: RemoteSchema.nullish().describe("the level of remote work available"),
    salary: z.string().nullish().describe("100000"),
    experience: z.string().nullish().describe("Senior or Junior or Mid-level"),
    responsibilities: z.array(z.string()).nullish().describe("what the job entails"),
    qualifications: z
      .array(z.string())
      .nullish()
      .describe("List out your qualifications"),
    skills: z.array(SkillSchema).nullish().describe("List out your professional skill-set"),
    meta: MetaSchema.nullish().describe(
      "The schema version and any other tooling configuration lives here"
    ),
  })
  .passthrough();

export type Location = z.infer<typeof LocationSchema>;
export type Skill = z.infer<typeof SkillSchema>;
export type Meta = z.infer<typeof MetaSchema>;
export type JobDescription = z.infer<typeof JobDescriptionSchema>;

export function getJobSchemaParser(): StructuredOutputParser<typeof JobDescriptionSchema> {
  return StructuredOutputParser.fromZodSchema(JobDescriptionSchema);
}

export function getJobSchemaFormatInstructions(): string {
  return getJobSchemaParser().getFormatInstructions();
}
