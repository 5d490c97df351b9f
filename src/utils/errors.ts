import type { RecordIssue } from "../types/feed.js";

export class FeedtreeError extends Error {
  exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class InvalidDigitError extends FeedtreeError {
  readonly character: string;
  readonly base: number;

  constructor(character: string, base: number) {
    super(`Invalid digit "${character}" for base ${base}`);
    this.character = character;
    this.base = base;
  }
}

export class MalformedDateStringError extends FeedtreeError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Malformed date string "${input}": ${reason}`);
    this.input = input;
  }
}

export class StructuralTreeError extends FeedtreeError {
  readonly tag: string;

  constructor(tag: string, reason: string) {
    super(`Malformed node <${tag}>: ${reason}`);
    this.tag = tag;
  }
}

export class ValidationError extends FeedtreeError {
  readonly issues: RecordIssue[];

  constructor(message: string, issues: RecordIssue[]) {
    super(message);
    this.issues = issues;
  }
}

export class FileStateError extends FeedtreeError {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.hint = hint;
  }
}

export class UsageError extends FeedtreeError {
  constructor(message: string) {
    super(message, 2);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
