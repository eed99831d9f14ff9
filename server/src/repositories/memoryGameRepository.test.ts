import { describe, it, expect, beforeEach } from 'vitest';
import { StaleGameError } from '../lib/errors';
import { applyMove } from '../services/gameService';
import { MemoryGameRepository } from './memoryGameRepository';

describe('MemoryGameRepository', () => {
  let repo: MemoryGameRepository;

  beforeEach(() => {
    repo = new MemoryGameRepository();
  });

  it('finds players by exact name', async () => {
    const alice = await repo.createPlayer('Alice');

    expect(await repo.findPlayerByName('Alice')).toEqual(alice);
    expect(await repo.findPlayerByName('alice')).toBeNull();
  });

  it('refuses to reference unknown players', async () => {
    await expect(repo.createGame({ playerXId: 'ghost' })).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('reuses named players and leaves an empty name unassigned', async () => {
    const alice = await repo.createPlayer('Alice');

    const game = await repo.createGameWithPlayers({ playerXName: '', playerOName: 'Alice' });
    const again = await repo.createGameWithPlayers({ playerXName: 'Bob', playerOName: 'Alice' });

    expect(game.playerX).toBeNull();
    expect(game.playerO).toEqual(alice);
    expect(again.playerO?.id).toBe(alice.id);
    expect(again.playerX?.id).toBe((await repo.findPlayerByName('Bob'))?.id);
  });

  it('hands out copies of stored state', async () => {
    const created = await repo.createGame();
    created.board[0] = 'X';
    created.moves.push({
      id: 'm',
      gameId: created.id,
      position: 0,
      playerSymbol: 'X',
      moveNumber: 1,
      createdAt: new Date(),
    });

    const stored = await repo.getGame(created.id);
    expect(stored?.board[0]).toBeNull();
    expect(stored?.moves).toEqual([]);
  });

  it('applies a transition computed from the stored state', async () => {
    const created = await repo.createGame();
    const { game, move } = applyMove(created, 'X', 4);

    await repo.saveGameTransition(game, move);

    const stored = await repo.getGame(created.id);
    expect(stored?.board[4]).toBe('X');
    expect(stored?.nextPlayer).toBe('O');
    expect(stored?.moves).toEqual([move]);
  });

  it('rejects a transition computed from an outdated read', async () => {
    const created = await repo.createGame();
    const first = applyMove(created, 'X', 4);
    const second = applyMove(created, 'X', 0);

    await repo.saveGameTransition(first.game, first.move);
    await expect(repo.saveGameTransition(second.game, second.move)).rejects.toBeInstanceOf(StaleGameError);

    const stored = await repo.getGame(created.id);
    expect(stored?.board).toEqual([null, null, null, null, 'X', null, null, null, null]);
    expect(stored?.moves).toHaveLength(1);
  });

  it('caps recent games at fifty', async () => {
    for (let i = 0; i < 52; i++) await repo.createGame();

    expect(await repo.listRecentGames()).toHaveLength(50);
    expect(await repo.listRecentGames(100)).toHaveLength(50);
    expect(await repo.listRecentGames(3)).toHaveLength(3);
  });
});
