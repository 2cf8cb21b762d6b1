import type { Express, Request, Response } from 'express';
import type { JobRunner } from '../core/JobRunner.js';

export type SystemDeps = {
  runner: Pick<JobRunner, 'getStats'>;
};

const LANDING_PAGE = `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Media Downloader</title>
</head>
<body>
<main>
<h1>Media Downloader</h1>
<p>Paste a link, pick a format, and download the file once it is ready.</p>
<form id="f">
<input id="url" type="url" placeholder="https://..." required>
<select id="format">
<option value="best">Best</option>
<option value="1080p">1080p</option>
<option value="720p">720p</option>
<option value="480p">480p</option>
<option value="360p">360p</option>
<option value="audio">Audio (mp3)</option>
<option value="flac">Audio (flac)</option>
</select>
<button type="submit">Download</button>
</form>
<p id="status"></p>
</main>
<script>
const statusEl = document.getElementById('status');
document.getElementById('f').addEventListener('submit', async (event) => {
  event.preventDefault();
  const body = { url: document.getElementById('url').value, format: document.getElementById('format').value };
  const res = await fetch('/download', { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) });
  const data = await res.json();
  if (!res.ok) { statusEl.textContent = data.error; return; }
  const poll = setInterval(async () => {
    const p = await (await fetch('/progress/' + data.download_id)).json();
    statusEl.textContent = p.status + ' ' + p.percent + '%';
    if (p.status === 'complete') { clearInterval(poll); location.href = '/file/' + encodeURIComponent(p.filename); }
    if (p.status === 'error') { clearInterval(poll); statusEl.textContent = p.error; }
  }, 500);
});
</script>
</body>
</html>
`;

export function setupSystemRoutes(app: Express, deps: SystemDeps) {
  const { runner } = deps;

  app.get('/', (_req: Request, res: Response) => {
    res.type('html').send(LANDING_PAGE);
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true, jobs: runner.getStats() });
  });
}
