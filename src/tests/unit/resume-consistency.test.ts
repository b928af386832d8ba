import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { checkResumeConsistency, extractExperienceYears } from "../../assessment/resume-consistency.service";
import { CandidateProfile } from "../../shared/types/assessment.types";

const NOW = new Date("2026-06-01T00:00:00.000Z");

function profile(overrides: Partial<CandidateProfile> = {}): CandidateProfile {
  return {
    fullName: "Test Candidate",
    email: "candidate@example.com",
    phone: "+1 555 0100 200",
    location: "Berlin",
    yearsOfExperience: 5,
    desiredPosition: "Backend Engineer",
    techStack: ["TypeScript", "PostgreSQL", "Kubernetes"],
    ...overrides,
  };
}

describe("extractExperienceYears", () => {
  it("reads counts before and after the experience keyword", () => {
    assert.deepEqual(extractExperienceYears("6 years of experience in backend work", NOW), [6]);
    assert.deepEqual(extractExperienceYears("Experience: 7+ years in backend", NOW), [7]);
  });

  it("reads open date ranges relative to now", () => {
    assert.deepEqual(extractExperienceYears("Engineer, 2019 - present", NOW), [7]);
  });

  it("returns nothing without a recognizable pattern", () => {
    assert.deepEqual(extractExperienceYears("Built services for a bank", NOW), []);
  });
});

describe("checkResumeConsistency", () => {
  it("matches claims supported by the resume", () => {
    const summary = checkResumeConsistency(
      profile(),
      "Backend developer with 6 years of experience building TypeScript services on PostgreSQL.",
      NOW,
    );

    assert.deepEqual(
      summary.fields.map((field) => [field.field, field.declaredValue, field.status]),
      [
        ["years_of_experience", "5", "matched"],
        ["desired_position", "Backend Engineer", "matched"],
        ["tech_stack", "TypeScript", "matched"],
        ["tech_stack", "PostgreSQL", "matched"],
        ["tech_stack", "Kubernetes", "unmatched"],
      ],
    );
    assert.equal(summary.consistencyRatio, 0.8);
    assert.deepEqual(summary.findings, ["Skills declared but not found in resume: Kubernetes"]);
  });

  it("reports discrepancies in order", () => {
    const summary = checkResumeConsistency(
      profile({ yearsOfExperience: 10, desiredPosition: "Data Scientist", techStack: ["Python"] }),
      "Software engineer since 2021 - present.",
      NOW,
    );

    assert.equal(summary.consistencyRatio, 0);
    assert.deepEqual(summary.findings, [
      "Experience discrepancy: claimed 10 years, resume suggests 5 years",
      "Desired position is not reflected in the resume content",
      "Skills declared but not found in resume: Python",
    ]);
  });

  it("leaves unverifiable experience out of the ratio", () => {
    const summary = checkResumeConsistency(
      profile({ yearsOfExperience: 3, desiredPosition: "Frontend Engineer", techStack: ["React"] }),
      "Frontend engineer shipping React apps.",
      NOW,
    );

    assert.equal(summary.fields[0]?.status, "unverifiable");
    assert.equal(summary.consistencyRatio, 1);
    assert.deepEqual(summary.findings, []);
  });
});
