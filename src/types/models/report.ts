/**
 * Outcome of one market research run
 */
export interface RunResult {
  success: boolean;
  timestamp: string;
  emailSent?: boolean;
  slackSent?: boolean;
  reportPath?: string | null;
  message: string;
  error?: string;
}
