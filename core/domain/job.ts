// core/domain/job.ts
import { z } from "zod";

import { InvalidInputError } from "./errors";
import { EDUCATION_LEVELS, type EducationLevel } from "./profile";

export const jobDescriptionSchema = z.object({
  title: z.string(),
  company: z.string(),
  description: z.string(),
  required_skills: z.array(z.string().trim().min(1, "required skill must be a non-empty string")).default([]),
  required_education: z.enum(EDUCATION_LEVELS).nullish(),
  required_years: z.number().finite().min(0).nullish(),
});

export type JobDescriptionInput = z.input<typeof jobDescriptionSchema>;

export type JobDescription = {
  title: string;
  company: string;
  description: string;
  required_skills: string[]; // trimmed, de-duplicated case-insensitively, first spelling kept
  required_education: EducationLevel | null;
  required_years: number | null;
};

export function dedupeCaseInsensitive(values: readonly string[], keyOf: (v: string) => string = (v) => v.toLowerCase()): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    const k = keyOf(v);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(v);
  }
  return out;
}

export function parseJobDescription(input: unknown): JobDescription {
  const parsed = jobDescriptionSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "job"}: ${i.message}`).join("; ");
    throw new InvalidInputError(`JOB_DESCRIPTION_INVALID: ${detail}`, parsed.error.issues);
  }
  const j = parsed.data;

  return {
    title: j.title,
    company: j.company,
    description: j.description,
    required_skills: dedupeCaseInsensitive(j.required_skills),
    required_education: j.required_education ?? null,
    required_years: j.required_years ?? null,
  };
}

export function jobText(job: JobDescription): string {
  return [job.title, job.description].filter((s) => s.trim()).join("\n");
}
