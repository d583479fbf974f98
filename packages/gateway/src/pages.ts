const PAGE_STYLE = `
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; display: flex; justify-content: center; align-items: center; height: 100vh; background: #f0f2f5; margin: 0; }
  .card { background: white; padding: 2rem; border-radius: 12px; box-shadow: 0 4px 6px -1px rgba(0,0,0,0.1); width: 100%; max-width: 320px; }
  h2 { text-align: center; color: #1a1a1a; margin-top: 0; }
  p { text-align: center; color: #718096; margin-bottom: 1.5rem; }
  label { display: block; margin-bottom: 0.5rem; color: #4a5568; font-size: 0.875rem; font-weight: 500; }
  input { width: 100%; padding: 0.75rem; margin-bottom: 1rem; border: 1px solid #e2e8f0; border-radius: 0.375rem; box-sizing: border-box; }
  button { width: 100%; padding: 0.75rem; background: #3182ce; color: white; border: none; border-radius: 0.375rem; font-weight: 600; cursor: pointer; }
  button:hover { background: #2c5282; }
  .error { color: #c53030; margin-bottom: 10px; }
`;

export const SETUP_ERROR_MESSAGE = "Invalid request";
export const LOGIN_ERROR_MESSAGE = "Account or password incorrect";

export function renderSetupPage(error?: string): string {
  return renderPage(
    "Gateway Setup",
    "Set up the access account for this gateway.",
    error,
    `<form method="POST" action="/setup">
      <label>Username (default: admin)</label>
      <input type="text" name="username" value="admin" required>
      <label>Password</label>
      <input type="password" name="password" required placeholder="Choose a password">
      <button type="submit">Save credentials</button>
    </form>`,
  );
}

export function renderLoginPage(error?: string, username = ""): string {
  return renderPage(
    "Gateway Login",
    "Sign in to continue.",
    error,
    `<form method="POST" action="/login">
      <label>Username</label>
      <input type="text" name="username" value="${escapeHtml(username || "admin")}" required>
      <label>Password</label>
      <input type="password" name="password" required placeholder="Password">
      <button type="submit">Sign in</button>
    </form>`,
  );
}

export function renderErrorPage(status: number, message: string): string {
  return renderPage(`Error ${status}`, escapeHtml(message), undefined, "");
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderPage(title: string, intro: string, error: string | undefined, body: string): string {
  const errorHtml = error ? `<div class="error">${escapeHtml(error)}</div>` : "";
  return `<!DOCTYPE html>
<html>
<head>
  <title>${title}</title>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <style>${PAGE_STYLE}</style>
</head>
<body>
  <div class="card">
    <h2>${title}</h2>
    <p>${intro}</p>
    ${errorHtml}
    ${body}
  </div>
</body>
</html>
`;
}
