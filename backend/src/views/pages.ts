export type StartFormError = 'domain' | 'email' | 'mail';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
</head>
<body>
<main>
<h1>${escapeHtml(title)}</h1>
${body}
</main>
</body>
</html>`;
}

const START_ERRORS: Record<StartFormError, (domain: string) => string> = {
  domain: domain => `Please use an email address ending in @${domain}.`,
  email: () => 'That does not look like an email address.',
  mail: () => 'We could not send the verification email. Please try again.',
};

export function isStartFormError(value: unknown): value is StartFormError {
  return value === 'domain' || value === 'email' || value === 'mail';
}

export function indexPage(): string {
  return layout(
    'Email Verification',
    '<p>Run <code>/verify</code> in a verification channel on Discord to get your personal verification link.</p>'
  );
}

export function startPage(allowedDomain: string, error?: StartFormError): string {
  const errorHtml = error ? `<p class="error" role="alert">${escapeHtml(START_ERRORS[error](allowedDomain))}</p>` : '';
  return layout(
    'Verify your email',
    `${errorHtml}
<p>Enter your @${escapeHtml(allowedDomain)} email address. We will send you a verification code.</p>
<form method="post">
<label for="email">Email</label>
<input id="email" name="email" type="email" required autocomplete="email">
<button type="submit">Send code</button>
</form>`
  );
}

export function verifyPage(remainingAttempts: number): string {
  return layout(
    'Enter your code',
    `<p>Check your inbox for the verification code. You have ${remainingAttempts} attempt${remainingAttempts === 1 ? '' : 's'} remaining.</p>
<form method="post">
<label for="verification">Verification code</label>
<input id="verification" name="verification" inputmode="numeric" required autocomplete="one-time-code">
<button type="submit">Verify</button>
</form>`
  );
}

export function successPage(): string {
  return layout('Verification complete', '<p>You are verified. Your role will be granted on Discord shortly.</p>');
}

export function failurePage(): string {
  return layout(
    'Verification failed',
    '<p>You have used all of your attempts. Ask a moderator to reset your session, then run <code>/verify</code> again.</p>'
  );
}

export function notFoundPage(): string {
  return layout('Page not found', '<p>This link is invalid or has expired. Run <code>/verify</code> on Discord to get a new one.</p>');
}

export function errorPage(): string {
  return layout('Something went wrong', '<p>An unexpected error occurred. Please try again later.</p>');
}
