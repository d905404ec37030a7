import type { ServerResponse } from 'http';
import { RegisterUserUseCase } from '../../domain/use-cases/RegisterUserUseCase';
import { AuthenticateUserUseCase } from '../../domain/use-cases/AuthenticateUserUseCase';
import { LogoutUseCase } from '../../domain/use-cases/LogoutUseCase';
import { CreateHabitUseCase } from '../../domain/use-cases/CreateHabitUseCase';
import { DeleteHabitUseCase } from '../../domain/use-cases/DeleteHabitUseCase';
import { ToggleCompletionUseCase } from '../../domain/use-cases/ToggleCompletionUseCase';
import { GetDashboardUseCase } from '../../domain/use-cases/GetDashboardUseCase';
import { isHabitTrackerError } from '../../domain/errors/HabitTrackerError';
import { AuthenticatedUser } from '../../domain/entities/User';
import { errorMessage, Logger } from '../../infrastructure/logger/Logger';
import { RequestSession, SessionManager } from './SessionManager';
import { html, json, parseId, readForm, redirect, safeDecode, WebRequest, WebResponse } from './http';
import { renderLoginPage, renderSignupPage } from './views/authPages';
import { renderDashboardPage } from './views/dashboardPage';
import { renderErrorPage } from './views/errorPages';

const NOT_FOUND_OR_FORBIDDEN = 'Habit not found or access denied.';

export interface WebAppUseCases {
  registerUser: RegisterUserUseCase;
  authenticateUser: AuthenticateUserUseCase;
  logout: LogoutUseCase;
  createHabit: CreateHabitUseCase;
  deleteHabit: DeleteHabitUseCase;
  toggleCompletion: ToggleCompletionUseCase;
  getDashboard: GetDashboardUseCase;
}

interface RouteContext {
  req: WebRequest;
  method: string;
  path: string;
  session: RequestSession;
}

export class WebApp {
  constructor(
    private useCases: WebAppUseCases,
    private sessionManager: SessionManager
  ) {}

  /**
   * Handles one request end to end. Never rejects: unexpected failures are
   * logged and answered with a generic 500 page.
   */
  async handle(req: WebRequest, res: ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const path = new URL(req.url || '/', 'http://localhost').pathname;

    let response: WebResponse;
    try {
      const session = await this.sessionManager.load(req);
      response = await this.route({ req, method, path, session });

      const cookie = await this.sessionManager.commit(session);
      if (cookie) {
        response.headers['Set-Cookie'] = cookie;
      }
    } catch (error) {
      Logger.error('Unhandled request error', {
        method,
        path,
        error: errorMessage(error),
      });
      response = html(renderErrorPage(500), 500);
    }

    res.writeHead(response.status, response.headers);
    res.end(response.body);
  }

  private async route(ctx: RouteContext): Promise<WebResponse> {
    const { method, path } = ctx;

    if (path === '/healthz') {
      return json({ ok: true });
    }

    if (path === '/signup') {
      if (method === 'GET') return html(renderSignupPage(ctx.session.consumeFlashes()));
      if (method === 'POST') return this.signup(ctx);
      return this.methodNotAllowed('GET, POST');
    }

    if (path === '/login') {
      if (method === 'GET') return html(renderLoginPage(ctx.session.consumeFlashes()));
      if (method === 'POST') return this.login(ctx);
      return this.methodNotAllowed('GET, POST');
    }

    if (path === '/logout') {
      if (method === 'GET') return this.logout(ctx);
      return this.methodNotAllowed('GET');
    }

    if (path === '/') {
      if (method === 'GET') return this.dashboard(ctx);
      if (method === 'POST') return this.createHabit(ctx);
      return this.methodNotAllowed('GET, POST');
    }

    const deleteMatch = /^\/delete_habit\/([^/]+)$/.exec(path);
    if (deleteMatch) {
      if (method === 'POST') return this.deleteHabit(ctx, deleteMatch[1]);
      return this.methodNotAllowed('POST');
    }

    const completeMatch = /^\/complete\/([^/]+)\/([^/]+)$/.exec(path);
    if (completeMatch) {
      if (method === 'GET') return this.toggleCompletion(ctx, completeMatch[1], safeDecode(completeMatch[2]));
      return this.methodNotAllowed('GET');
    }

    return html(renderErrorPage(404), 404);
  }

  private methodNotAllowed(allow: string): WebResponse {
    const response = html(renderErrorPage(405), 405);
    response.headers.Allow = allow;
    return response;
  }

  private requireUser(session: RequestSession, notice: string): AuthenticatedUser | null {
    const identity = session.identity;
    if (!identity) {
      session.flash('warning', notice);
    }
    return identity;
  }

  private async signup(ctx: RouteContext): Promise<WebResponse> {
    const form = await readForm(ctx.req);
    try {
      await this.useCases.registerUser.execute(form.get('username'), form.get('password'));
    } catch (error) {
      if (isHabitTrackerError(error, 'InvalidInput') || isHabitTrackerError(error, 'DuplicateUsername')) {
        ctx.session.flash('danger', error.message);
        return redirect('/signup');
      }
      throw error;
    }

    ctx.session.flash('success', 'Registration successful! Please log in.');
    return redirect('/login');
  }

  private async login(ctx: RouteContext): Promise<WebResponse> {
    const form = await readForm(ctx.req);
    let user: AuthenticatedUser;
    try {
      user = await this.useCases.authenticateUser.execute(form.get('username'), form.get('password'));
    } catch (error) {
      if (isHabitTrackerError(error, 'InvalidCredentials')) {
        const flashes = [...ctx.session.consumeFlashes(), { category: 'danger' as const, message: error.message }];
        return html(renderLoginPage(flashes));
      }
      throw error;
    }

    await this.sessionManager.regenerate(ctx.session);
    ctx.session.bindIdentity(user);
    ctx.session.flash('success', `Welcome back, ${user.username}!`);
    return redirect('/');
  }

  private async logout(ctx: RouteContext): Promise<WebResponse> {
    await this.useCases.logout.execute(ctx.session.id);
    ctx.session.reset();
    ctx.session.flash('info', 'You have been logged out.');
    return redirect('/login');
  }

  private async dashboard(ctx: RouteContext): Promise<WebResponse> {
    const user = this.requireUser(ctx.session, 'Please log in to view your habits.');
    if (!user) {
      return redirect('/login');
    }

    const dashboard = await this.useCases.getDashboard.execute(user.userId);
    return html(renderDashboardPage(dashboard, user.username, ctx.session.consumeFlashes()));
  }

  private async createHabit(ctx: RouteContext): Promise<WebResponse> {
    const user = this.requireUser(ctx.session, 'Please log in to view your habits.');
    if (!user) {
      return redirect('/login');
    }

    const form = await readForm(ctx.req);
    try {
      await this.useCases.createHabit.execute(user.userId, form.get('habit_name'), form.get('goal_duration'), user.username);
    } catch (error) {
      if (isHabitTrackerError(error, 'InvalidInput')) {
        ctx.session.flash('warning', error.message);
      } else if (isHabitTrackerError(error, 'InvalidConfiguration')) {
        ctx.session.flash('danger', error.message);
      } else {
        throw error;
      }
    }
    return redirect('/');
  }

  private async deleteHabit(ctx: RouteContext, rawHabitId: string): Promise<WebResponse> {
    const user = this.requireUser(ctx.session, 'Please log in.');
    if (!user) {
      return redirect('/login');
    }

    const habitId = parseId(rawHabitId);
    if (habitId === null) {
      ctx.session.flash('danger', NOT_FOUND_OR_FORBIDDEN);
      return redirect('/');
    }

    try {
      const habit = await this.useCases.deleteHabit.execute(user.userId, habitId, user.username);
      ctx.session.flash('success', `Habit "${habit.name}" has been deleted.`);
    } catch (error) {
      if (!isHabitTrackerError(error, 'NotFoundOrForbidden')) {
        throw error;
      }
      ctx.session.flash('danger', error.message);
    }
    return redirect('/');
  }

  private async toggleCompletion(ctx: RouteContext, rawHabitId: string, date: string): Promise<WebResponse> {
    const user = this.requireUser(ctx.session, 'Please log in to track habits.');
    if (!user) {
      return redirect('/login');
    }

    const habitId = parseId(rawHabitId);
    if (habitId === null) {
      ctx.session.flash('danger', NOT_FOUND_OR_FORBIDDEN);
      return redirect('/');
    }

    try {
      await this.useCases.toggleCompletion.execute(user.userId, habitId, date, user.username);
    } catch (error) {
      if (isHabitTrackerError(error, 'NotFoundOrForbidden')) {
        ctx.session.flash('danger', error.message);
      } else if (!isHabitTrackerError(error, 'InvalidDate')) {
        throw error;
      }
      // A malformed date is ignored without a notice
    }
    return redirect('/');
  }
}
