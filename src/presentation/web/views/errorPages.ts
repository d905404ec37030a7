import { renderLayout } from './layout';

const TITLES: Record<number, string> = {
  404: 'Page not found',
  405: 'Method not allowed',
  500: 'Something went wrong',
};

export function renderErrorPage(status: number): string {
  const title = TITLES[status] ?? 'Error';
  return renderLayout(title, `<h1>${title}</h1><p><a href="/">Back to your habits</a></p>`, []);
}
