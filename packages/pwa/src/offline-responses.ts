/**
 * Synthesized responses returned when neither the network nor the cache can
 * answer a request.
 */

export const OFFLINE_JSON_BODY = {
  success: false,
  error: 'You are offline. Please check your connection.',
  offline: true,
} as const;

export const OFFLINE_PAGE_TITLE = 'Offline - Attendance Tracker';

/** Header naming the queued action id on an offline action response */
export const QUEUED_ACTION_HEADER = 'X-Offline-Queued';

const OFFLINE_PAGE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${OFFLINE_PAGE_TITLE}</title>
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      min-height: 100vh;
      margin: 0;
      background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
      color: white;
      text-align: center;
      padding: 20px;
    }
    .offline-container {
      max-width: 400px;
      background: rgba(255, 255, 255, 0.1);
      padding: 40px;
      border-radius: 20px;
    }
    .retry-btn {
      background: #007bff;
      color: white;
      border: none;
      padding: 12px 24px;
      border-radius: 8px;
      cursor: pointer;
      margin-top: 20px;
    }
  </style>
</head>
<body>
  <div class="offline-container">
    <h1>You're Offline</h1>
    <p>The attendance tracker is currently unavailable. Please check your internet connection and try again.</p>
    <button class="retry-btn" onclick="window.location.reload()">Try Again</button>
  </div>
</body>
</html>`;

/**
 * `503` JSON answer for API calls. Extra headers are added on top of the
 * JSON content type.
 */
export function offlineJsonResponse(extraHeaders: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(OFFLINE_JSON_BODY), {
    status: 503,
    statusText: 'Service Unavailable',
    headers: { ...extraHeaders, 'Content-Type': 'application/json' },
  });
}

/** Self-contained page for navigations with no cached root document */
export function offlineHtmlResponse(): Response {
  return new Response(OFFLINE_PAGE, {
    status: 200,
    headers: { 'Content-Type': 'text/html' },
  });
}

/** Answer for sub-resources that could not be fetched */
export function offlineGenericResponse(): Response {
  return new Response('Offline', {
    status: 503,
    statusText: 'Service Unavailable',
    headers: { 'Content-Type': 'text/plain' },
  });
}
