export const TICK_MS = 100; // one advance step; lasers travel 10 cells/s
export const TICK_RATE = 1000 / TICK_MS; // Hz

// Roster
export const MAX_ACTIVE_PLAYERS = 4;
export const PLAYER_ID_MAX_LENGTH = 32;
export const PLAYER_NAME_MAX_LENGTH = 20;

// Spaceship
export const INITIAL_LIVES = 5;
export const INITIAL_ROTATION = 0;
export const SHIELD_DURATION_MS = 3_000;

// Hazards
export const LASER_DAMAGE = 1;
export const MINE_DAMAGE = 3;
export const LASER_RANGE = 15; // cells a laser may travel after spawning

// Player-relative environment view (Chebyshev radius, inclusive)
export const ENVIRONMENT_RADIUS = 5;
export const ENVIRONMENT_MAX_RADIUS = 30;

// Default arena footprint (matches the bundled maps)
export const GRID_WIDTH = 30;
export const GRID_HEIGHT = 20;

export const HTTP_PORT = 8000;
export const WS_PORT = 8001;
