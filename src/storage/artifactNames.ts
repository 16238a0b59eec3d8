import { randomUUID } from 'crypto';

export type ArtifactKind = 'Webhook' | 'chart' | 'report';

const pad = (value: number) => String(value).padStart(2, '0');

/** UTC `YYYYMMDD_HHMMSS`. */
export function artifactTimestamp(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}_${time}`;
}

// The random suffix is the only thing keeping concurrent requests apart.
export function artifactName(kind: ArtifactKind, extension: string, now: Date = new Date()): string {
  const suffix = randomUUID().replace(/-/g, '');
  return `${kind}_${artifactTimestamp(now)}_${suffix}.${extension}`;
}
