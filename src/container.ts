import { AppConfig } from './infrastructure/config/env';
import { RedisConnection } from './infrastructure/config/redis';
import { IHabitRepository } from './domain/repositories/IHabitRepository';
import { IUserRepository } from './domain/repositories/IUserRepository';
import { ISessionRepository } from './domain/repositories/ISessionRepository';
import { IPasswordHasher } from './domain/services/IPasswordHasher';
import { Clock, systemClock } from './domain/utils/dates';
import { RedisHabitRepository } from './infrastructure/repositories/RedisHabitRepository';
import { RedisUserRepository } from './infrastructure/repositories/RedisUserRepository';
import { RedisSessionRepository } from './infrastructure/repositories/RedisSessionRepository';
import { InMemoryDatabase } from './infrastructure/repositories/InMemoryDatabase';
import { InMemoryHabitRepository } from './infrastructure/repositories/InMemoryHabitRepository';
import { InMemoryUserRepository } from './infrastructure/repositories/InMemoryUserRepository';
import { InMemorySessionRepository } from './infrastructure/repositories/InMemorySessionRepository';
import { BcryptPasswordHasher } from './infrastructure/security/BcryptPasswordHasher';
import { RegisterUserUseCase } from './domain/use-cases/RegisterUserUseCase';
import { AuthenticateUserUseCase } from './domain/use-cases/AuthenticateUserUseCase';
import { LogoutUseCase } from './domain/use-cases/LogoutUseCase';
import { CreateHabitUseCase } from './domain/use-cases/CreateHabitUseCase';
import { DeleteHabitUseCase } from './domain/use-cases/DeleteHabitUseCase';
import { GetUserHabitsUseCase } from './domain/use-cases/GetUserHabitsUseCase';
import { ToggleCompletionUseCase } from './domain/use-cases/ToggleCompletionUseCase';
import { GetDashboardUseCase } from './domain/use-cases/GetDashboardUseCase';
import { SessionManager } from './presentation/web/SessionManager';
import { WebApp } from './presentation/web/WebApp';

export interface Repositories {
  users: IUserRepository;
  habits: IHabitRepository;
  sessions: ISessionRepository;
}

export interface AppContainer {
  repositories: Repositories;
  webApp: WebApp;
  close(): Promise<void>;
}

export interface ContainerOverrides {
  clock?: Clock;
  repositories?: Repositories;
  passwordHasher?: IPasswordHasher;
}

export function createInMemoryRepositories(clock: Clock = systemClock): Repositories {
  const db = new InMemoryDatabase();
  return {
    users: new InMemoryUserRepository(db),
    habits: new InMemoryHabitRepository(db),
    sessions: new InMemorySessionRepository(db, clock),
  };
}

/**
 * Wires repositories, use cases and the web app for the configured storage.
 */
export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): AppContainer {
  const clock = overrides.clock || systemClock;

  let connection: RedisConnection | null = null;
  let repositories: Repositories;
  if (overrides.repositories) {
    repositories = overrides.repositories;
  } else if (config.storage.driver === 'redis') {
    connection = new RedisConnection(config.storage.redisUrl);
    repositories = {
      users: new RedisUserRepository(connection),
      habits: new RedisHabitRepository(connection),
      sessions: new RedisSessionRepository(connection),
    };
  } else {
    repositories = createInMemoryRepositories(clock);
  }

  const passwordHasher = overrides.passwordHasher || new BcryptPasswordHasher(config.bcryptRounds);
  const getUserHabitsUseCase = new GetUserHabitsUseCase(repositories.habits);

  const webApp = new WebApp(
    {
      registerUser: new RegisterUserUseCase(repositories.users, passwordHasher),
      authenticateUser: new AuthenticateUserUseCase(repositories.users, passwordHasher),
      logout: new LogoutUseCase(repositories.sessions),
      createHabit: new CreateHabitUseCase(repositories.habits, clock),
      deleteHabit: new DeleteHabitUseCase(repositories.habits),
      toggleCompletion: new ToggleCompletionUseCase(repositories.habits),
      getDashboard: new GetDashboardUseCase(getUserHabitsUseCase, repositories.habits, clock),
    },
    new SessionManager(repositories.sessions, config.sessionTtlSeconds, config.isProduction)
  );

  return {
    repositories,
    webApp,
    close: async () => {
      if (connection) {
        await connection.close();
      }
    },
  };
}
