// src/utils/email.ts

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(email: string) {
  return EMAIL_PATTERN.test(email);
}
