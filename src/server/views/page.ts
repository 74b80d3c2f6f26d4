import type { GatewayModeName } from "../../core/schemas/index.js";

export interface PageOptions {
  mode: GatewayModeName;
  provider: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

// Client script: posts the textarea to /analyze and fills the sections with
// the server-rendered markdown (raw HTML in model output is already escaped).
const CLIENT_SCRIPT = `
(function () {
  var form = document.getElementById("analyze-form");
  var input = document.getElementById("input-text");
  var status = document.getElementById("status");
  var results = document.getElementById("results");
  var button = document.getElementById("analyze-btn");

  function show(el, text) {
    el.textContent = text;
    el.hidden = !text;
  }

  form.addEventListener("submit", function (event) {
    event.preventDefault();
    show(status, "");
    results.hidden = true;
    if (!input.value.trim()) {
      show(status, "Please paste text to analyze.");
      return;
    }
    button.disabled = true;
    show(status, "Analyzing...");
    fetch("/analyze", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ text: input.value })
    })
      .then(function (res) { return res.json(); })
      .then(function (body) {
        if (body.warning || body.error) {
          show(status, body.warning || body.error);
          return;
        }
        show(status, "");
        document.getElementById("red-flags").innerHTML = body.html.redFlags;
        document.getElementById("summary").innerHTML = body.html.summary;
        document.getElementById("insights").innerHTML = body.html.insights;
        results.hidden = false;
      })
      .catch(function (err) { show(status, String(err)); })
      .finally(function () { button.disabled = false; });
  });

  document.getElementById("clear-btn").addEventListener("click", function () {
    input.value = "";
    show(status, "");
    results.hidden = true;
  });
})();
`;

/**
 * Render the single-page form: input, Analyze/Clear, three result sections
 * and the live-mode instructions footer.
 */
export function renderPage(options: PageOptions): string {
  const banner =
    options.mode === "mock"
      ? `<p class="banner">Running in MOCK mode – no Gemini API key detected.</p>`
      : `<p class="banner live">Live mode – using ${escapeHtml(options.provider)}.</p>`;

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>AI Misinformation Toolkit</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 760px; margin: 2rem auto; padding: 0 1rem; }
    textarea { width: 100%; min-height: 220px; font: inherit; }
    .output { background: #f6f6f6; padding: 0.75rem; border-radius: 4px; }
    .banner { background: #fff4d6; padding: 0.5rem; }
    .banner.live { background: #e3f6e3; }
    #status { color: #8a5a00; }
  </style>
</head>
<body>
  <h1>🛡️ AI Misinformation Toolkit (Prototype)</h1>
  <p>Paste text (news, social post, forward). Prototype: Red flags, factual summary, and educational insights.</p>
  ${banner}
  <form id="analyze-form">
    <label for="input-text">Paste suspicious text here:</label>
    <textarea id="input-text" name="text" placeholder="Paste an article, tweet thread, WhatsApp forward, etc."></textarea>
    <button id="analyze-btn" type="submit">🔍 Analyze</button>
    <button id="clear-btn" type="button">Clear</button>
  </form>
  <p id="status" hidden></p>
  <section id="results" hidden>
    <h2>🚩 Red Flag Analysis</h2>
    <div id="red-flags" class="output"></div>
    <h2>📌 Factual Summary</h2>
    <div id="summary" class="output"></div>
    <h2>🎓 Educational Insights</h2>
    <div id="insights" class="output"></div>
    <p class="tip">Tip: For production, wire model outputs to citation checks (news sources, fact-checkers) and show evidence links.</p>
  </section>
  <hr />
  <footer>
    <h3>How to enable Gemini (live mode)</h3>
    <ul>
      <li>Create a file at <code>.secrets/secrets.env</code> with:
        <pre>GEMINI_API_KEY="your_actual_api_key_here"</pre>
      </li>
      <li>Or set environment variable <code>GEMINI_API_KEY</code>.</li>
    </ul>
    <p>If you enable the key, the app will call Gemini. Without it, the app runs in MOCK mode so you can test the UI.</p>
  </footer>
  <script>${CLIENT_SCRIPT}</script>
</body>
</html>
`;
}
