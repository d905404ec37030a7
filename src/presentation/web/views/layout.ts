import { FlashMessage } from '../../../domain/entities/Session';
import { escapeHtml } from './html';

const STYLES = `
  body { font-family: system-ui, sans-serif; margin: 0; background: #f4f5f7; color: #1f2933; }
  header { display: flex; justify-content: space-between; align-items: center; padding: 12px 24px; background: #1f2933; color: #fff; }
  header a { color: #fff; }
  main { max-width: 960px; margin: 24px auto; padding: 0 16px; }
  .flash { padding: 10px 14px; border-radius: 6px; margin-bottom: 12px; }
  .flash-success { background: #d1fae5; } .flash-info { background: #dbeafe; }
  .flash-warning { background: #fef3c7; } .flash-danger { background: #fee2e2; }
  .card { background: #fff; border-radius: 8px; padding: 16px; margin-bottom: 16px; box-shadow: 0 1px 2px rgba(0,0,0,.08); }
  .progress { height: 8px; background: #e5e7eb; border-radius: 4px; overflow: hidden; }
  .progress > span { display: block; height: 100%; background: #10b981; }
  .strip { display: flex; gap: 6px; margin: 12px 0; }
  .strip a { width: 44px; text-align: center; padding: 6px 0; border-radius: 6px; background: #e5e7eb; color: inherit; text-decoration: none; font-size: 12px; }
  .strip a.done { background: #10b981; color: #fff; }
  .heatmap { display: grid; grid-template-rows: repeat(7, 10px); grid-auto-flow: column; gap: 2px; overflow-x: auto; }
  .heatmap span { width: 10px; height: 10px; border-radius: 2px; }
  .heatmap .completed { background: #10b981; } .heatmap .missed { background: #f87171; } .heatmap .pending { background: #d1d5db; }
  .pie { width: 96px; height: 96px; border-radius: 50%; }
  .stats { display: flex; gap: 24px; align-items: center; margin-top: 12px; }
`;

export function renderFlashes(flashes: FlashMessage[]): string {
  return flashes
    .map(flash => `<div class="flash flash-${flash.category}" role="alert">${escapeHtml(flash.message)}</div>`)
    .join('\n');
}

export function renderLayout(title: string, content: string, flashes: FlashMessage[], username?: string): string {
  const account = username
    ? `<span>Signed in as <strong>${escapeHtml(username)}</strong> · <a href="/logout">Log out</a></span>`
    : '<span><a href="/login">Log in</a> · <a href="/signup">Sign up</a></span>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · Daily Habits</title>
<style>${STYLES}</style>
</head>
<body>
<header><strong>Daily Habits</strong>${account}</header>
<main>
${renderFlashes(flashes)}
${content}
</main>
</body>
</html>`;
}
