import { z } from 'zod';
import { parsed, parseFailure, type ParseResult } from '@index-meta/shared';
import { MD5, SHA256 } from '../hash';
import type { Version } from '../package';

function hashText<H>(parse: (text: string) => ParseResult<H>) {
  return z.string().transform((text, ctx) => {
    const result = parse(text);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.message });
      return z.NEVER;
    }
    return result.value;
  });
}

export const TargetSchema = z.object({
  length: z.number().int().nonnegative(),
  hashes: z.object({
    md5: hashText(MD5.parseHex),
    sha256: hashText(SHA256.parseHex),
  }),
});

/** Signed-targets document stored as `pkg/ver/package.json`. */
export const SignedTargetsSchema = z.object({
  signed: z.object({
    _type: z.literal('Targets'),
    expires: z.null(),
    targets: z.record(TargetSchema),
  }),
});

export type Target = z.infer<typeof TargetSchema>;
export type SignedTargets = z.infer<typeof SignedTargetsSchema>;

/** Key under which the release tarball of `packageName-version` is listed. */
export function tarballTargetKey(packageName: string, version: Version): string {
  return `<repo>/package/${packageName}-${version.toString()}.tar.gz`;
}

export function parseSignedTargets(text: string): ParseResult<SignedTargets> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return parseFailure(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const result = SignedTargetsSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return parseFailure(issues);
  }
  return parsed(result.data);
}

/**
 * The target of a release's tarball. Signed targets that do not list it are
 * rejected, naming the keys that were present.
 */
export function targetFor(
  document: SignedTargets,
  packageName: string,
  version: Version,
): ParseResult<Target> {
  const key = tarballTargetKey(packageName, version);
  const targets = document.signed.targets;
  if (!Object.prototype.hasOwnProperty.call(targets, key)) {
    return parseFailure(
      `Missing target ${JSON.stringify(key)}; present: ${JSON.stringify(Object.keys(targets))}`,
    );
  }
  return parsed(targets[key]);
}
