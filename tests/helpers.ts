import { PlayerPool } from '../src/core/playerPool';
import { Player, Role } from '../src/models/types';

export function player(role: Role, value: number, cost: number): Player {
  return { role, value, cost };
}

/** One player per role, forward first. */
export function onePerRole(): PlayerPool {
  return new PlayerPool([
    player('forward', 100, 60),
    player('midfielder', 100, 65),
    player('defender', 90, 50),
    player('goalkeeper', 80, 40),
  ]);
}
