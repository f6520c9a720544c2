export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  authHost: string;
}

export interface TaskTarget {
  portalId: string;
  projectId: string;
  taskId: string;
}

export interface LogTimeConfig extends OAuthConfig, TaskTarget {
  projectsHost: string;
  ownerId?: string;
  billStatus: string;
  notesPrefix: string;
  timeZone: string;
  startTime: string;
  endTime: string;
  timeoutMs: number;
}

export type Env = Record<string, string | undefined>;
