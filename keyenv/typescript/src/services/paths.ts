const segment = encodeURIComponent;

export function environmentsPath(projectId: string): string {
  return `/projects/${segment(projectId)}/environments`;
}

export function secretsPath(projectId: string, environment: string, key?: string): string {
  const base = `${environmentsPath(projectId)}/${segment(environment)}/secrets`;
  return key === undefined ? base : `${base}/${segment(key)}`;
}

export function secretsExportPath(projectId: string, environment: string): string {
  return `${secretsPath(projectId, environment)}/export`;
}
