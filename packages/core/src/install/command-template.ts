import { UsageError } from '@provisioner/shared';

export interface ExpandedCommand {
  command: string;
  args: string[];
}

/**
 * Substitutes `{name}` placeholders in every element of a configured command.
 * Unknown placeholders are left as written.
 */
export function expandCommand(template: string[], vars: Record<string, string>): ExpandedCommand {
  const [first, ...rest] = template.map((part) =>
    part.replace(/\{(\w+)\}/g, (match: string, key: string) => vars[key] ?? match),
  );
  if (!first) {
    throw new UsageError('Command template is empty');
  }
  return { command: first, args: rest };
}
