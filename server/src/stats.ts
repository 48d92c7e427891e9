import type { PlayerStats, StatsView } from "shared";
import type { ArenaEvent } from "./world.js";

interface PlayerRecord {
  playerId: string;
  joinedAt: number;
  eliminatedAt: number | null;
  laserHits: number;
  livesLost: number;
  lastSurviving: boolean;
}

const CSV_COLUMNS = ["player_id", "seconds_survived", "laser_hits", "lives_lost", "is_last_surviving"] as const;

function csvField(value: string | number | boolean): string {
  const s = String(value);
  return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Per-player match statistics, fed from committed events only */
export class MatchStats {
  private gameId = "";
  private records: Map<string, PlayerRecord> = new Map();

  /** Start over when a new game begins */
  sync(gameId: string): void {
    if (gameId === this.gameId) return;
    this.gameId = gameId;
    this.records.clear();
  }

  record(events: readonly ArenaEvent[], now: number): void {
    for (const event of events) {
      switch (event.type) {
        case "player_joined":
          this.records.set(event.playerId, {
            playerId: event.playerId,
            joinedAt: now,
            eliminatedAt: null,
            laserHits: 0,
            livesLost: 0,
            lastSurviving: false,
          });
          break;
        case "player_left":
          this.records.delete(event.playerId);
          break;
        case "laser_hit": {
          if (event.absorbed || event.livesLost === 0) break;
          const owner = this.records.get(event.ownerId);
          if (owner) owner.laserHits++;
          const target = this.records.get(event.targetId);
          if (target) target.livesLost += event.livesLost;
          break;
        }
        case "mine_triggered": {
          const target = this.records.get(event.playerId);
          if (target) target.livesLost += event.livesLost;
          break;
        }
        case "ship_eliminated": {
          const target = this.records.get(event.playerId);
          if (target) target.eliminatedAt = now;
          break;
        }
        case "game_over": {
          const winner = event.winner === null ? undefined : this.records.get(event.winner);
          if (winner) winner.lastSurviving = true;
          break;
        }
        default:
          break;
      }
    }
  }

  getPlayerStats(now: number): PlayerStats[] {
    return Array.from(this.records.values()).map((r) => ({
      player_id: r.playerId,
      seconds_survived: Math.round(((r.eliminatedAt ?? now) - r.joinedAt) / 10) / 100,
      laser_hits: r.laserHits,
      lives_lost: r.livesLost,
      is_last_surviving: r.lastSurviving,
    }));
  }

  getSummary(now: number): StatsView {
    return { game_id: this.gameId, players: this.getPlayerStats(now) };
  }

  toCsv(now: number): string {
    const rows = this.getPlayerStats(now).map((s) => CSV_COLUMNS.map((c) => csvField(s[c])).join(","));
    return [CSV_COLUMNS.join(","), ...rows].join("\n") + "\n";
  }
}
