import type { AxiosInstance } from 'axios';
import { SubmitError } from '../errors.js';
import type { TaskTarget } from '../types/config.js';
import type { LogEntryOptions, SubmitResult, TimeWindow } from '../types/zoho.js';
import { bodyToString, createHttpClient, errorMessage, FORM_CONTENT_TYPE, type HttpOptions, toHttpFailure } from './http.js';

export function buildLogForm(window: TimeWindow, entry: LogEntryOptions): URLSearchParams {
  const data = new URLSearchParams();
  data.append('date', window.date);
  data.append('bill_status', entry.billStatus);
  data.append('hours', window.hours);
  data.append('notes', `${entry.notesPrefix} - ${window.date}`);
  if (entry.ownerId) {
    data.append('owner', entry.ownerId);
  }
  return data;
}

export function logsPath(target: TaskTarget): string {
  const segment = encodeURIComponent;
  return `/portal/${segment(target.portalId)}/projects/${segment(target.projectId)}/tasks/${segment(target.taskId)}/logs/`;
}

export class ZohoProjectsService {
  private client: AxiosInstance;

  constructor(projectsHost: string, http: HttpOptions) {
    this.client = createHttpClient(http, `https://${projectsHost}/restapi`);
  }

  /**
   * Creates one time log on the task. There is no idempotency key, so calling
   * this twice for the same day records two entries.
   */
  async submitLog(
    accessToken: string,
    target: TaskTarget,
    window: TimeWindow,
    entry: LogEntryOptions
  ): Promise<SubmitResult> {
    try {
      const response = await this.client.post<string>(logsPath(target), buildLogForm(window, entry).toString(), {
        headers: {
          'Authorization': `Zoho-oauthtoken ${accessToken}`,
          'Content-Type': FORM_CONTENT_TYPE,
        },
      });
      return { status: response.status, body: bodyToString(response.data) };
    } catch (error) {
      throw new SubmitError(`Error calling Zoho Projects API: ${errorMessage(error)}`, toHttpFailure(error));
    }
  }
}
