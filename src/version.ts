/** Version of husk itself. Kept in step with package.json at release time. */
export const HUSK_VERSION = '0.1.0';

export function currentWrapperVersion(): string {
  return HUSK_VERSION;
}
