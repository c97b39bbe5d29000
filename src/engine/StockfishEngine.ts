/**
 * StockfishEngine - Wraps a single native Stockfish process
 * Handles UCI protocol communication
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import type {
  AnalysisEngine,
  AnalysisOptions,
  EngineAnalysis,
  EngineLine,
} from '../types/index.js';
import { config } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { EngineError, EngineTimeoutError, EngineUnavailableError } from './errors.js';
import { isBestMoveLine, parseBestMove, parseInfoLine } from './uciParser.js';

const engineLogger = createChildLogger('stockfish');

const QUIT_GRACE_MS = 2000;

/**
 * The parts of a child process the engine talks to
 */
export interface EngineProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: (code: number | null) => void): this;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface StockfishEngineOptions {
  path?: string;
  threads?: number;
  hashMb?: number;
  /** Upper bound for every command round-trip, added to movetime for searches */
  timeoutMs?: number;
  spawnProcess?: (path: string) => EngineProcess;
}

export class StockfishEngine extends EventEmitter implements AnalysisEngine {
  private process: EngineProcess | null = null;
  private isReady: boolean = false;
  private isBusy: boolean = false;
  private exitError: EngineUnavailableError | null = null;
  private outputBuffer: string = '';
  private pvLines: Map<number, EngineLine> = new Map();
  private currentDepth: number = 0;
  private readonly path: string;
  private readonly threads: number;
  private readonly hashMb: number;
  private readonly timeoutMs: number;
  private readonly spawnProcess: (path: string) => EngineProcess;

  constructor(options: StockfishEngineOptions = {}) {
    super();
    this.path = options.path ?? config.stockfishPath;
    this.threads = options.threads ?? config.stockfishThreads;
    this.hashMb = options.hashMb ?? config.stockfishHashMb;
    this.timeoutMs = options.timeoutMs ?? config.engineTimeoutMs;
    this.spawnProcess = options.spawnProcess ?? ((path) => spawn(path, []));
  }

  get ready(): boolean {
    return this.isReady && !this.isBusy;
  }

  get exited(): boolean {
    return this.exitError !== null;
  }

  async initialize(): Promise<void> {
    if (this.process) {
      return;
    }

    engineLogger.debug({ path: this.path }, 'Starting engine');

    const child = this.spawnProcess(this.path);
    this.process = child;

    // Set up output handler BEFORE sending any commands
    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (data: string) => this.handleOutput(data));

    child.stderr.on('data', (data: Buffer) => {
      engineLogger.warn({ stderr: data.toString().trim() }, 'Engine wrote to stderr');
    });

    // Writes to a dead process surface as EPIPE on stdin
    child.stdin.on('error', (err: Error) => {
      this.handleExit(new EngineUnavailableError(this.path, err));
    });

    child.on('error', (err) => {
      this.handleExit(new EngineUnavailableError(this.path, err));
    });

    child.on('close', (code) => {
      this.handleExit(
        new EngineUnavailableError(this.path, `process exited with code ${code}`)
      );
    });

    const uciOk = this.waitForLine((line) => line === 'uciok', 'uci', this.timeoutMs);
    this.sendCommand('uci');
    await uciOk;

    this.sendCommand(`setoption name Threads value ${this.threads}`);
    this.sendCommand(`setoption name Hash value ${this.hashMb}`);

    const readyOk = this.waitForLine((line) => line === 'readyok', 'isready', this.timeoutMs);
    this.sendCommand('isready');
    await readyOk;

    this.isReady = true;
    engineLogger.debug({ path: this.path }, 'Engine ready');
  }

  async analyze(fen: string, options: AnalysisOptions): Promise<EngineAnalysis> {
    if (this.exitError) {
      throw this.exitError;
    }

    if (!this.isReady) {
      throw new EngineError('Engine is not initialized');
    }

    if (this.isBusy) {
      throw new EngineError('Engine is busy');
    }

    this.isBusy = true;
    this.pvLines.clear();
    this.currentDepth = 0;

    const timeout = options.movetime + this.timeoutMs;
    const bestMoveLine = this.waitForLine(isBestMoveLine, 'analyze', timeout);

    this.sendCommand(`setoption name MultiPV value ${options.multiPv}`);
    this.sendCommand(`position fen ${fen}`);
    this.sendCommand(`go movetime ${options.movetime}`);

    try {
      const line = await bestMoveLine;

      const lines = [...this.pvLines.values()]
        .filter((pv) => pv.multipv <= options.multiPv)
        .sort((a, b) => a.multipv - b.multipv);

      return {
        lines,
        bestMove: parseBestMove(line),
        depth: this.currentDepth,
      };
    } catch (error) {
      if (error instanceof EngineTimeoutError) {
        this.stop();
      }
      throw error;
    } finally {
      this.isBusy = false;
    }
  }

  stop(): void {
    this.sendCommand('stop');
  }

  async dispose(): Promise<void> {
    const child = this.process;
    this.isReady = false;

    if (!child || this.exitError) {
      return;
    }

    const closed = new Promise<void>((resolve) => {
      const forceKill = setTimeout(() => {
        engineLogger.warn({ path: this.path }, 'Engine ignored quit, killing it');
        child.kill('SIGKILL');
        resolve();
      }, QUIT_GRACE_MS);

      this.once('exit', () => {
        clearTimeout(forceKill);
        resolve();
      });
    });

    this.sendCommand('quit');
    await closed;
  }

  private handleOutput(data: string): void {
    this.outputBuffer += data;
    const lines = this.outputBuffer.split('\n');

    // Keep incomplete line in buffer
    this.outputBuffer = lines.pop() || '';

    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;

      const info = parseInfoLine(line);
      if (info) {
        this.pvLines.set(info.multipv, info);
        this.currentDepth = Math.max(this.currentDepth, info.depth);
      }

      this.emit('output', line);
    }
  }

  private handleExit(error: EngineUnavailableError): void {
    if (this.exitError) {
      return;
    }

    this.exitError = error;
    this.isReady = false;
    engineLogger.debug({ path: this.path, reason: error.details }, 'Engine exited');
    this.emit('exit', error);
  }

  /**
   * Resolve with the first output line matching `match`.
   * Register before sending the command that triggers it.
   */
  private waitForLine(
    match: (line: string) => boolean,
    operation: string,
    timeoutMs: number
  ): Promise<string> {
    if (this.exitError) {
      return Promise.reject(this.exitError);
    }

    return new Promise<string>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timeout);
        this.off('output', onOutput);
        this.off('exit', onExit);
      };

      const onOutput = (line: string) => {
        if (match(line)) {
          cleanup();
          resolve(line);
        }
      };

      const onExit = (error: EngineUnavailableError) => {
        cleanup();
        reject(error);
      };

      const timeout = setTimeout(() => {
        cleanup();
        reject(new EngineTimeoutError(operation, timeoutMs));
      }, timeoutMs);

      this.on('output', onOutput);
      this.on('exit', onExit);
    });
  }

  private sendCommand(command: string): void {
    const stdin = this.process?.stdin;
    if (stdin && !stdin.destroyed && !this.exitError) {
      stdin.write(`${command}\n`);
    }
  }
}
