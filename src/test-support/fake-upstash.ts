/**
 * In-process stand-in for the Upstash Redis REST endpoint. Implements the
 * handful of commands RedisTaskRepository sends.
 */
export class FakeUpstash {
  private strings = new Map<string, string>();
  private zsets = new Map<string, Map<string, number>>();
  readonly commands: string[][] = [];

  readonly fetch = async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const body = typeof init?.body === 'string' ? init.body : '[]';
    const parsed: unknown = JSON.parse(body);
    const command = Array.isArray(parsed) ? parsed.map(String) : [];
    this.commands.push(command);

    try {
      return Response.json({ result: this.execute(command) });
    } catch (error) {
      return Response.json({ error: error instanceof Error ? error.message : String(error) });
    }
  };

  private zset(key: string): Map<string, number> {
    let set = this.zsets.get(key);
    if (!set) {
      set = new Map();
      this.zsets.set(key, set);
    }
    return set;
  }

  private sorted(key: string): string[] {
    return Array.from(this.zsets.get(key) ?? new Map<string, number>())
      .sort((a, b) => a[1] - b[1] || (a[0] < b[0] ? -1 : 1))
      .map(([member]) => member);
  }

  private slice(members: string[], start: string, stop: string): string[] {
    const len = members.length;
    let from = Number(start);
    let to = Number(stop);
    if (from < 0) from = len + from;
    if (to < 0) to = len + to;
    return members.slice(Math.max(0, from), to + 1);
  }

  private bound(value: string): { score: number; exclusive: boolean } {
    const exclusive = value.startsWith('(');
    const raw = exclusive ? value.slice(1) : value;
    const score = raw === '-inf' ? -Infinity : raw === '+inf' ? Infinity : Number(raw);
    return { score, exclusive };
  }

  private execute(command: string[]): unknown {
    const [name = '', ...args] = command;
    switch (name.toUpperCase()) {
      case 'SET':
        this.strings.set(args[0] ?? '', args[1] ?? '');
        return 'OK';
      case 'GET':
        return this.strings.get(args[0] ?? '') ?? null;
      case 'MGET':
        return args.map(key => this.strings.get(key) ?? null);
      case 'DEL': {
        let removed = 0;
        for (const key of args) {
          if (this.strings.delete(key) || this.zsets.delete(key)) removed++;
        }
        return removed;
      }
      case 'ZADD': {
        const set = this.zset(args[0] ?? '');
        const added = set.has(args[2] ?? '') ? 0 : 1;
        set.set(args[2] ?? '', Number(args[1]));
        return added;
      }
      case 'ZREM': {
        const set = this.zsets.get(args[0] ?? '');
        let removed = 0;
        for (const member of args.slice(1)) {
          if (set?.delete(member)) removed++;
        }
        return removed;
      }
      case 'ZCARD':
        return this.zsets.get(args[0] ?? '')?.size ?? 0;
      case 'ZRANGE':
        return this.slice(this.sorted(args[0] ?? ''), args[1] ?? '0', args[2] ?? '-1');
      case 'ZREVRANGE':
        return this.slice(this.sorted(args[0] ?? '').reverse(), args[1] ?? '0', args[2] ?? '-1');
      case 'ZRANGEBYSCORE': {
        const key = args[0] ?? '';
        const min = this.bound(args[1] ?? '-inf');
        const max = this.bound(args[2] ?? '+inf');
        return this.sorted(key).filter(member => {
          const score = this.zsets.get(key)?.get(member) ?? 0;
          const aboveMin = min.exclusive ? score > min.score : score >= min.score;
          const belowMax = max.exclusive ? score < max.score : score <= max.score;
          return aboveMin && belowMax;
        });
      }
      default:
        throw new Error(`ERR unknown command '${name}'`);
    }
  }
}
