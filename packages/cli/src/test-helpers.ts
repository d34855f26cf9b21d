/**
 * Shared helpers for CLI tests
 */

import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export type CapturedOutput<T> = {
  readonly result: T;
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];
};

/**
 * Run with console.log and console.error collected instead of printed
 */
export const captureConsole = async <T>(
  run: () => T | Promise<T>
): Promise<CapturedOutput<T>> => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;
  console.log = (...args: unknown[]) => {
    stdout.push(args.map(String).join(" "));
  };
  console.error = (...args: unknown[]) => {
    stderr.push(args.map(String).join(" "));
  };

  try {
    const result = await run();
    return { result, stdout, stderr };
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
};

/**
 * Temporary project with the given files (paths relative to its root)
 */
export const createProject = (files: Record<string, string>): string => {
  const root = mkdtempSync(join(tmpdir(), "pairmap-cli-"));
  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(root, path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
  return root;
};

export const USER_MAPPER = [
  "export class UserMapper extends BaseMapper<User, UserDto> {",
  "  map(user: User): UserDto {",
  "    return new UserDto(user.name);",
  "  }",
  "}",
].join("\n");

export const AUDITED_MAPPER = [
  "export class AuditedMapper extends BaseMapper<User, UserDto> {",
  "  constructor(private readonly clock: Clock) {",
  "    super();",
  "  }",
  "  map(user: User): UserDto {",
  "    return new UserDto(user.name);",
  "  }",
  "}",
].join("\n");

export const PROFILE_MAPPER = [
  "export class ProfileMapper extends Profile<User, UserDto> {",
  "  async map(user: User): Promise<UserDto> {",
  "    return new UserDto(user.name);",
  "  }",
  "}",
].join("\n");

export const AUDITED_MAPPER_ERROR =
  "error PM001: Mapper 'AuditedMapper' should not have constructor parameters. Mappers should be pure data transformations with no dependencies. Hint: Move services and I/O to the caller";
