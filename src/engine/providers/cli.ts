/**
 * Command-line translator - spawns an LLM CLI (claude, gemini, cursor-agent, ...)
 * with the prompt as its last argument and reads the translation from stdout.
 */

import { spawn } from 'child_process';
import type {
  ITranslator,
  TranslatorRequest,
  TranslatorResponse,
} from '../interfaces/translator.js';
import { FatalTranslatorError, TransportError } from '../errors.js';
import { createStandalonePrompt } from '../prompts/translator.js';

export interface CliTranslatorConfig {
  name: string;
  command: string;
  args?: string[];
}

interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

function runProcess(
  command: string,
  args: string[],
  signal?: AbortSignal
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal, stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', reject);
    child.on('close', (code) => resolve({ code, stdout, stderr }));
  });
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CliTranslator implements ITranslator {
  readonly name: string;

  private config: CliTranslatorConfig;

  constructor(config: CliTranslatorConfig) {
    this.config = config;
    this.name = config.name;
  }

  async translate(request: TranslatorRequest, signal?: AbortSignal): Promise<TranslatorResponse> {
    const prompt = createStandalonePrompt(request.text, request.sourceLang, request.targetLang);
    const args = [...(this.config.args ?? []), prompt];

    let result: ProcessResult;
    try {
      result = await runProcess(this.config.command, args, signal);
    } catch (error) {
      if (isMissingBinary(error)) {
        throw new FatalTranslatorError(
          `${this.config.command} not found. Please ensure it's installed and in PATH.`,
          { cause: error }
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${this.name} CLI failed: ${message}`, { cause: error });
    }

    if (result.code !== 0) {
      throw new TransportError(
        `${this.name} CLI exited with code ${result.code}: ${result.stderr.trim()}`
      );
    }

    return {
      text: result.stdout,
      metadata: {
        command: this.config.command,
        promptLength: prompt.length,
      },
    };
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await runProcess(this.config.command, ['--version'], AbortSignal.timeout(5000));
      return result.code === 0;
    } catch (error) {
      console.warn(`[${this.name}] Not available: ${error instanceof Error ? error.message : error}`);
      return false;
    }
  }
}
