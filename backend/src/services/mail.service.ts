export interface VerificationMessage {
  to: string;
  token: string;
  expiresAt: Date;
}

export interface Mailer {
  sendVerificationEmail(message: VerificationMessage): Promise<void>;
}

/**
 * Writes outgoing mail to the console instead of delivering it.
 */
export function createConsoleMailer(from: string): Mailer {
  return {
    async sendVerificationEmail({ to, token, expiresAt }) {
      console.log(
        [
          `From: ${from}`,
          `To: ${to}`,
          "Subject: Verify your account",
          "",
          "Use this token to verify your email address:",
          token,
          `It expires at ${expiresAt.toISOString()}.`,
        ].join("\n"),
      );
    },
  };
}
