import { z } from 'zod/v4';

/**
 * Properties loaded from a fixture's header.
 *
 * The plain directive dialect fills `revisions`, `compileFlags` and
 * `expectedExitCode`; the structured conformance dialect fills
 * `expectations`.
 */
export const TestPropsSchema = z.object({
  revisions: z.array(z.string().min(1)).default([]),
  compileFlags: z.array(z.string()).default([]),
  expectedExitCode: z.number().int().min(0).max(255).optional(),
  expectations: z.array(z.string()).default([]),
});

export type TestProps = z.infer<typeof TestPropsSchema>;

/** Host platforms a fixture can be restricted to or excluded from. */
export const PlatformSchema = z.enum(['linux', 'macos', 'windows']);

export type Platform = z.infer<typeof PlatformSchema>;

export function hostPlatform(platform: NodeJS.Platform = process.platform): Platform | undefined {
  switch (platform) {
    case 'linux': return 'linux';
    case 'darwin': return 'macos';
    case 'win32': return 'windows';
    default: return undefined;
  }
}
