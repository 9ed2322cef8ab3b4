import {UserStatMapSchema} from '../schemas/quiz';
import {readJsonFile, writeJsonFile} from '../storage/jsonFile';
import {SerialQueue} from '../storage/serialQueue';
import {CategoryStat, UserStat} from '../types/quiz';

export interface UserStore {
  /** Never fails for an unknown user: returns a zeroed stat instead */
  get(userId: string): Promise<UserStat>;
  put(userId: string, stat: UserStat): Promise<void>;
  list(): Promise<UserStat[]>;
}

type UserStatMap = Record<string, UserStat>;

export function emptyUserStat(userId: string): UserStat {
  return {userId, answered: 0, correct: 0, categories: {}};
}

export function accuracy(stat: Pick<UserStat, 'answered' | 'correct'>): number {
  return stat.answered === 0 ? 0 : stat.correct / stat.answered;
}

export class JsonUserStore implements UserStore {
  private readonly writes = new SerialQueue();

  constructor(private readonly filePath: string) {}

  async get(userId: string): Promise<UserStat> {
    const users = await this.readAll();
    const stat = users[userId];
    return stat ? copyStat(stat) : emptyUserStat(userId);
  }

  put(userId: string, stat: UserStat): Promise<void> {
    return this.writes.run(async () => {
      const users = await this.readAll();
      users[userId] = {...copyStat(stat), userId};
      await writeJsonFile(this.filePath, users);
    });
  }

  async list(): Promise<UserStat[]> {
    return Object.values(await this.readAll());
  }

  private readAll(): Promise<UserStatMap> {
    return readJsonFile<UserStatMap>(this.filePath, {}, UserStatMapSchema);
  }
}

export function copyStat(stat: UserStat): UserStat {
  const categories: Record<string, CategoryStat> = {};
  for (const [name, entry] of Object.entries(stat.categories)) {
    categories[name] = {...entry};
  }
  return {...stat, categories};
}
