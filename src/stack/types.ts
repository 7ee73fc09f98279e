export const ECOSYSTEMS = ['csharp', 'go', 'java', 'javascript', 'kotlin', 'php', 'python', 'ruby', 'typescript'] as const;

export type Ecosystem = (typeof ECOSYSTEMS)[number];

export interface TechStack {
  ecosystem: Ecosystem;
  /** Web or application framework layered on the ecosystem, when one is detected. */
  framework?: string;
  /** `python` or `python/flask`. */
  label: string;
}

export function stackLabel(ecosystem: Ecosystem, framework?: string): string {
  return framework ? `${ecosystem}/${framework}` : ecosystem;
}
