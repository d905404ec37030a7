import { FlashMessage } from '../../../domain/entities/Session';
import { renderLayout } from './layout';

function renderCredentialsForm(action: string, submitLabel: string): string {
  return `<form class="card" method="post" action="${action}">
  <p><label>Username<br><input name="username" autocomplete="username" required></label></p>
  <p><label>Password<br><input name="password" type="password" required></label></p>
  <button type="submit">${submitLabel}</button>
</form>`;
}

export function renderLoginPage(flashes: FlashMessage[]): string {
  const content = `<h1>Log in</h1>
${renderCredentialsForm('/login', 'Log in')}
<p>No account yet? <a href="/signup">Sign up</a></p>`;
  return renderLayout('Log in', content, flashes);
}

export function renderSignupPage(flashes: FlashMessage[]): string {
  const content = `<h1>Sign up</h1>
${renderCredentialsForm('/signup', 'Create account')}
<p>Already registered? <a href="/login">Log in</a></p>`;
  return renderLayout('Sign up', content, flashes);
}
