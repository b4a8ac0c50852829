import { createHash } from 'node:crypto';

export const MAX_LABEL_LENGTH = 63;

/** `app.kubernetes.io/instance`-style scoping labels for objects a charm owns. */
export function createCharmDefaultLabels(appName: string, modelName: string, scope: string): Record<string, string> {
  return {
    'app.kubernetes.io/instance': charmKubernetesLabel(appName, modelName),
    'kubernetes-resource-handler-scope': scope,
  };
}

/**
 * `<app>-<model><suffix>`, kept within the label value limit.
 *
 * Names that do not fit are cut and get an 8 character hash of the full
 * name, so distinct apps never collide after truncation.
 */
export function charmKubernetesLabel(
  appName: string,
  modelName: string,
  suffix = '',
  maxLength = MAX_LABEL_LENGTH,
): string {
  const full = `${appName}-${modelName}${suffix}`;
  if (full.length <= maxLength) return full;

  const hash = createHash('sha256').update(full).digest('hex').slice(0, 8);
  const keep = maxLength - suffix.length - hash.length - 1;
  const head = `${appName}-${modelName}`.slice(0, keep).replace(/[-.]+$/, '');
  return `${head}-${hash}${suffix}`;
}

export function formatLabelSelector(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

/** Equality-based selector match, as the API server does for `k=v,k2=v2`. */
export function matchesLabelSelector(labels: Record<string, string> | undefined, selector: string): boolean {
  if (selector.trim() === '') return true;
  return selector.split(',').every((term) => {
    const [key, value] = term.split('=');
    return key !== undefined && labels?.[key.trim()] === value?.trim();
  });
}
