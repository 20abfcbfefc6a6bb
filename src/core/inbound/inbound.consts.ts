export const AUTH_MISMATCH_MESSAGE = "Authorization mismatch. Contact the operator.";
export const AUTH_FAILED_MESSAGE = "Authorization failed. Contact the operator.";
export const AUTH_CODE_REQUIRED_MESSAGE = "Authorization code required. Send /start <code>.";
export const AUTH_USERNAME_REQUIRED_MESSAGE = "Authorization requires a Telegram username.";
