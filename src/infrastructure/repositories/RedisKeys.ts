// Key layout shared by the Redis repositories:
//   users:next_id / habits:next_id / completions:next_id  INCR counters
//   user:{id}               hash { id, username, passwordHash }
//   username:{username}     string -> user id, written with the user hash under WATCH
//   user:{id}:habits        list of habit ids in creation order
//   habit:{id}              hash { id, userId, name, goalDuration, startDate }
//   habit:{id}:completions  hash date -> completion id
//   session:{id}            JSON session, expires with the session TTL
export const RedisKeys = {
  userSequence: () => 'users:next_id',
  habitSequence: () => 'habits:next_id',
  completionSequence: () => 'completions:next_id',
  user: (userId: number) => `user:${userId}`,
  username: (username: string) => `username:${username}`,
  userHabits: (userId: number) => `user:${userId}:habits`,
  habit: (habitId: number) => `habit:${habitId}`,
  habitCompletions: (habitId: number) => `habit:${habitId}:completions`,
  session: (sessionId: string) => `session:${sessionId}`,
};
