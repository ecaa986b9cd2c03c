// ═══════════════════════════════════════════════════════════════════════════════
// FEEDBACK PAGES — HTML Shown After an E-mailed Feedback Link Is Clicked
// ═══════════════════════════════════════════════════════════════════════════════

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

const BASE_STYLE = `
      body { font-family: Arial, sans-serif; display: flex; justify-content: center;
             align-items: center; height: 100vh; margin: 0; }
      .container { background: white; padding: 40px; border-radius: 10px; text-align: center;
                   box-shadow: 0 4px 6px rgba(0,0,0,0.1); }
      h1 { color: #333; margin-bottom: 20px; }
      p { color: #666; font-size: 18px; }
      .emoji { font-size: 64px; margin-bottom: 20px; }`;

function page(title: string, background: string, body: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <style>${BASE_STYLE}
      body { background: ${background}; }
    </style>
  </head>
  <body>
    <div class="container">
${body}
    </div>
  </body>
</html>
`;
}

export function renderThankYouPage(action: 'like' | 'dislike'): string {
  const emoji = action === 'like' ? '&#128077;' : '&#128078;';
  return page(
    'Feedback Recorded',
    'linear-gradient(135deg, #667eea 0%, #764ba2 100%)',
    `      <div class="emoji">${emoji}</div>
      <h1>Thank You!</h1>
      <p>Your feedback has been recorded.</p>
      <p>We'll use this to personalize your future news digests.</p>`
  );
}

export function renderErrorPage(message: string): string {
  return page(
    'Error',
    '#f44336',
    `      <h1>Oops!</h1>
      <p>Something went wrong recording your feedback.</p>
      <p>${escapeHtml(message)}</p>`
  );
}

export const MISSING_PARAMETERS_PAGE = '<h1>400 Bad Request</h1><p>Missing parameters</p>';
