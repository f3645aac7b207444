import { readFile, writeFile, mkdir, rename } from "node:fs/promises";
import { dirname, join } from "node:path";
import { Move, parseMove } from "@rps-arena/core";
import { getConfigDir } from "../config/configFile";

/** What a player must keep between committing and revealing. */
export interface CommittedMove {
  move: Move;
  nonce: string;
  commitment: string;
  /** Epoch milliseconds */
  savedAt: number;
}

export interface MoveSecret extends CommittedMove {
  /**
   * Moves this one replaced while the server's answer to them was unknown.
   * One of them may be the commitment the server actually holds.
   */
  earlier?: CommittedMove[];
}

export interface SecretKey {
  serverUrl: string;
  matchId: number;
  player: string;
}

type SecretMap = Record<string, MoveSecret>;

export function getSecretsPath(): string {
  return join(getConfigDir(), "secrets.json");
}

function keyOf({ serverUrl, matchId, player }: SecretKey): string {
  return `${serverUrl.replace(/\/+$/, "")}|${player.toLowerCase()}|${matchId}`;
}

function toCommittedMove(value: unknown): CommittedMove | null {
  if (typeof value !== "object" || value === null) {
    return null;
  }
  const fields = new Map(Object.entries(value));
  const move = fields.get("move");
  const nonce = fields.get("nonce");
  const commitment = fields.get("commitment");
  const savedAt = fields.get("savedAt");
  const parsedMove = typeof move === "string" ? parseMove(move) : null;
  if (
    parsedMove === null ||
    typeof nonce !== "string" ||
    typeof commitment !== "string" ||
    typeof savedAt !== "number"
  ) {
    return null;
  }
  return { move: parsedMove, nonce, commitment, savedAt };
}

function toSecret(value: unknown): MoveSecret | null {
  const current = toCommittedMove(value);
  if (!current || typeof value !== "object" || value === null) {
    return null;
  }
  const earlier = Object.entries(value).find(([key]) => key === "earlier")?.[1];
  if (!Array.isArray(earlier)) {
    return current;
  }
  const moves = earlier.map(toCommittedMove).filter((m): m is CommittedMove => m !== null);
  return moves.length > 0 ? { ...current, earlier: moves } : current;
}

/**
 * Move secrets on disk, keyed by server, player and match. Losing one means
 * the move can no longer be revealed, so writes go through a temp file.
 */
export class SecretStore {
  constructor(private readonly path: string = getSecretsPath()) {}

  async get(key: SecretKey): Promise<MoveSecret | undefined> {
    const all = await this.readAll();
    return all[keyOf(key)];
  }

  async save(key: SecretKey, secret: MoveSecret): Promise<void> {
    const all = await this.readAll();
    all[keyOf(key)] = secret;
    await this.writeAll(all);
  }

  /** Returns false if there was nothing to remove. */
  async remove(key: SecretKey): Promise<boolean> {
    const all = await this.readAll();
    const id = keyOf(key);
    if (!(id in all)) {
      return false;
    }
    delete all[id];
    await this.writeAll(all);
    return true;
  }

  async count(): Promise<number> {
    return Object.keys(await this.readAll()).length;
  }

  private async readAll(): Promise<SecretMap> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return {};
      }
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error(`${this.path} does not contain a JSON object`);
    }
    const secrets: SecretMap = {};
    for (const [id, value] of Object.entries(parsed)) {
      const secret = toSecret(value);
      if (secret) {
        secrets[id] = secret;
      }
    }
    return secrets;
  }

  private async writeAll(secrets: SecretMap): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(secrets, null, 2) + "\n", {
      encoding: "utf-8",
      mode: 0o600,
    });
    await rename(tmp, this.path);
  }
}
