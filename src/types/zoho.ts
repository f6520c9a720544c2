export interface TimeWindow {
  /** MM-DD-YYYY, the format Zoho Projects expects for `date`. */
  date: string;
  /** Zero-padded HH:MM. */
  hours: string;
}

export interface LogEntryOptions {
  billStatus: string;
  notesPrefix: string;
  ownerId?: string;
}

export interface SubmitResult {
  status: number;
  body: string;
}
