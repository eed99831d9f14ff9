import { GameRecord, Move, Player } from '../types/game';

export function playerOut(p: Player | null) {
  if (!p) return null;
  return { id: p.id, name: p.name, created_at: p.createdAt.toISOString() };
}

export function moveOut(m: Move) {
  return {
    move_number: m.moveNumber,
    position: m.position,
    player: m.playerSymbol,
    created_at: m.createdAt.toISOString(),
  };
}

// Board cells go out as ' ', 'X' or 'O'.
export function gameOut(g: GameRecord) {
  return {
    id: g.id,
    board: g.board.map((c) => c ?? ' '),
    next_player: g.nextPlayer,
    status: g.status,
    winner: g.winner,
    player_x: playerOut(g.playerX),
    player_o: playerOut(g.playerO),
    moves: g.moves.map(moveOut),
    created_at: g.createdAt.toISOString(),
    updated_at: g.updatedAt.toISOString(),
  };
}
