import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { describe, it, expect, vi } from 'vitest';

import { StockfishEngine, type EngineProcess } from '../StockfishEngine.js';
import { EngineError, EngineTimeoutError, EngineUnavailableError } from '../errors.js';

type Responder = (command: string, proc: FakeEngineProcess) => void;

/**
 * In-process stand-in for a UCI engine child process
 */
class FakeEngineProcess extends EventEmitter implements EngineProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly commands: string[] = [];
  readonly kill = vi.fn((_signal?: NodeJS.Signals): boolean => {
    this.exit(null);
    return true;
  });

  constructor(private readonly respond: Responder) {
    super();
    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => {
      for (const command of chunk.split('\n').filter(Boolean)) {
        this.commands.push(command);
        this.respond(command, this);
      }
    });
  }

  send(...lines: string[]): void {
    this.stdout.write(lines.map((line) => `${line}\n`).join(''));
  }

  exit(code: number | null): void {
    setImmediate(() => this.emit('close', code));
  }
}

const TEST_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/**
 * Answers the handshake; `onGo` scripts the search output
 */
function uciResponder(onGo: Responder = () => {}): Responder {
  return (command, proc) => {
    if (command === 'uci') {
      proc.send('id name FakeFish', 'id author test', 'uciok');
    } else if (command === 'isready') {
      proc.send('readyok');
    } else if (command.startsWith('go')) {
      onGo(command, proc);
    } else if (command === 'quit') {
      proc.exit(0);
    }
  };
}

function createEngine(respond: Responder, timeoutMs: number = 1000) {
  const proc = new FakeEngineProcess(respond);
  const spawnProcess = vi.fn((_path: string) => proc);
  const engine = new StockfishEngine({
    path: 'stockfish',
    threads: 2,
    hashMb: 32,
    timeoutMs,
    spawnProcess,
  });
  return { engine, proc, spawnProcess };
}

describe('StockfishEngine', () => {
  describe('initialize', () => {
    it('performs the UCI handshake and configures the engine', async () => {
      const { engine, proc, spawnProcess } = createEngine(uciResponder());

      await engine.initialize();

      expect(spawnProcess).toHaveBeenCalledWith('stockfish');
      expect(proc.commands).toEqual([
        'uci',
        'setoption name Threads value 2',
        'setoption name Hash value 32',
        'isready',
      ]);
      expect(engine.ready).toBe(true);

      await engine.dispose();
    });

    it('rejects with EngineUnavailableError when the binary cannot be spawned', async () => {
      const { engine } = createEngine((command, proc) => {
        if (command === 'uci') {
          setImmediate(() => proc.emit('error', new Error('spawn stockfish ENOENT')));
        }
      });

      const failure = engine.initialize();

      await expect(failure).rejects.toBeInstanceOf(EngineUnavailableError);
      await expect(failure).rejects.toThrow(
        "Engine at 'stockfish' is unavailable: spawn stockfish ENOENT"
      );
      expect(engine.exited).toBe(true);
    });

    it('times out when uciok never arrives', async () => {
      const { engine } = createEngine(() => {}, 20);

      await expect(engine.initialize()).rejects.toBeInstanceOf(EngineTimeoutError);
    });
  });

  describe('analyze', () => {
    it('collects the latest line per rank and the best move', async () => {
      const { engine, proc } = createEngine(
        uciResponder((_command, p) => {
          p.send(
            'info string NNUE evaluation enabled',
            'info depth 1 seldepth 1 multipv 1 score cp 20 nodes 30 pv e2e4',
            'info depth 12 seldepth 15 multipv 2 score cp 15 nodes 9000 pv d2d4 d7d5',
            'info depth 12 seldepth 16 multipv 1 score cp 35 nodes 9000 pv e2e4 e7e5 g1f3',
            'bestmove e2e4 ponder e7e5'
          );
        })
      );

      await engine.initialize();
      const analysis = await engine.analyze(TEST_FEN, { movetime: 50, multiPv: 2 });

      expect(analysis).toEqual({
        lines: [
          {
            multipv: 1,
            depth: 12,
            score: { type: 'cp', value: 35 },
            pv: ['e2e4', 'e7e5', 'g1f3'],
          },
          {
            multipv: 2,
            depth: 12,
            score: { type: 'cp', value: 15 },
            pv: ['d2d4', 'd7d5'],
          },
        ],
        bestMove: 'e2e4',
        depth: 12,
      });
      expect(proc.commands.slice(-3)).toEqual([
        'setoption name MultiPV value 2',
        `position fen ${TEST_FEN}`,
        'go movetime 50',
      ]);

      await engine.dispose();
    });

    it('starts every search from a clean slate', async () => {
      let search = 0;
      const { engine } = createEngine(
        uciResponder((_command, p) => {
          search++;
          if (search === 1) {
            p.send('info depth 5 multipv 1 score cp 80 pv g1f3', 'bestmove g1f3');
          } else {
            p.send('info depth 0 score mate 0', 'bestmove (none)');
          }
        })
      );

      await engine.initialize();
      await engine.analyze(TEST_FEN, { movetime: 10, multiPv: 1 });
      const terminal = await engine.analyze(TEST_FEN, { movetime: 10, multiPv: 1 });

      expect(terminal).toEqual({
        lines: [{ multipv: 1, depth: 0, score: { type: 'mate', value: 0 }, pv: [] }],
        bestMove: null,
        depth: 0,
      });

      await engine.dispose();
    });

    it('rejects with EngineUnavailableError when the process dies mid-search', async () => {
      const { engine } = createEngine(uciResponder((_command, p) => p.exit(1)));

      await engine.initialize();

      await expect(engine.analyze(TEST_FEN, { movetime: 10, multiPv: 1 })).rejects.toThrow(
        "Engine at 'stockfish' is unavailable: process exited with code 1"
      );
      expect(engine.exited).toBe(true);
    });

    it('stops the search and rejects on timeout', async () => {
      const { engine, proc } = createEngine(uciResponder(), 20);

      await engine.initialize();

      await expect(
        engine.analyze(TEST_FEN, { movetime: 10, multiPv: 1 })
      ).rejects.toBeInstanceOf(EngineTimeoutError);
      expect(proc.commands).toContain('stop');

      await engine.dispose();
    });

    it('refuses to search before initialize', async () => {
      const { engine } = createEngine(uciResponder());

      await expect(engine.analyze(TEST_FEN, { movetime: 10, multiPv: 1 })).rejects.toThrow(
        EngineError
      );
    });
  });

  describe('dispose', () => {
    it('sends quit and waits for the process to exit', async () => {
      const { engine, proc } = createEngine(uciResponder());

      await engine.initialize();
      await engine.dispose();

      expect(proc.commands.at(-1)).toBe('quit');
      expect(proc.kill).not.toHaveBeenCalled();
      expect(engine.exited).toBe(true);
    });

    it('returns at once when the process already exited', async () => {
      const { engine, proc } = createEngine(uciResponder((_command, p) => p.exit(1)));

      await engine.initialize();
      await expect(engine.analyze(TEST_FEN, { movetime: 10, multiPv: 1 })).rejects.toThrow();
      await engine.dispose();

      expect(proc.commands).not.toContain('quit');
      expect(proc.kill).not.toHaveBeenCalled();
    });

    it('does nothing when the engine was never started', async () => {
      const { engine, spawnProcess } = createEngine(uciResponder());

      await engine.dispose();

      expect(spawnProcess).not.toHaveBeenCalled();
    });
  });
});
