/**
 * Unit tests for environment configuration
 *
 * Explicit env objects, no process.env mutation, no file system
 */

import { describe, it, expect } from "vitest";
import { ConfigError, loadPipelineConfig } from "@/config/env";

describe("loadPipelineConfig", () => {
  it("should use defaults for an empty environment", () => {
    expect(loadPipelineConfig({})).toEqual({
      language: "en",
      profile: "default",
      pageConcurrency: 4,
      documentTimeoutMs: 30000,
      minFrequency: 1,
    });
  });

  it("should read every setting", () => {
    expect(
      loadPipelineConfig({
        GLOSSARY_LANGUAGE: "DE",
        VALIDATION_PROFILE: "strict",
        PAGE_CONCURRENCY: "2",
        DOCUMENT_TIMEOUT_MS: "5000",
        MIN_TERM_FREQUENCY: "3",
      }),
    ).toEqual({
      language: "de",
      profile: "strict",
      pageConcurrency: 2,
      documentTimeoutMs: 5000,
      minFrequency: 3,
    });
  });

  it("should accept every validation profile", () => {
    for (const profile of ["strict", "lenient", "technical", "standards", "academic"]) {
      expect(loadPipelineConfig({ VALIDATION_PROFILE: profile }).profile).toBe(profile);
    }
  });

  it("should list the profiles when rejecting an unknown one", () => {
    expect(() => loadPipelineConfig({ VALIDATION_PROFILE: "loose" })).toThrow(
      'Invalid configuration: VALIDATION_PROFILE must be one of default, strict, lenient, technical, standards, academic, got "loose"',
    );
  });

  it("should reject unsupported languages and profiles", () => {
    expect(() => loadPipelineConfig({ GLOSSARY_LANGUAGE: "fr" })).toThrow(
      'Invalid configuration: GLOSSARY_LANGUAGE "fr" is not supported',
    );
    expect(() => loadPipelineConfig({ VALIDATION_PROFILE: "loose" })).toThrow(
      ConfigError,
    );
  });

  it("should reject non-positive numbers", () => {
    expect(() => loadPipelineConfig({ PAGE_CONCURRENCY: "0" })).toThrow(
      'Invalid configuration: PAGE_CONCURRENCY must be a positive integer, got "0"',
    );
    expect(() => loadPipelineConfig({ DOCUMENT_TIMEOUT_MS: "soon" })).toThrow(
      ConfigError,
    );
  });
});
