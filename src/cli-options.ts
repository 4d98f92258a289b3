/**
 * CLI Options Parser
 * Handles command-line argument parsing for the rcd fetch tool
 */

import type { CliOptionsData } from './types.js';

export class CliOptions implements CliOptionsData {
  nonBlocking: boolean = false;
  bulk: boolean = false;
  help: boolean = false;
  statusPort: number | null = null;
  manifestPath: string | null = null;
  virtualPath: string | null = null;
  outFile: string | null = null;
  errors: string[] = [];

  constructor(argv: string[] = process.argv.slice(2)) {
    this._parse(argv);
  }

  private _parse(argv: string[]): void {
    const args: string[] = [];

    // Separate flags from positional arguments
    for (let i = 0; i < argv.length; i++) {
      const arg = argv[i];
      if (arg.startsWith('--')) {
        const flag = arg.slice(2);
        if (flag === 'nonblocking') {
          this.nonBlocking = true;
        } else if (flag === 'bulk') {
          this.bulk = true;
        } else if (flag === 'help') {
          this.help = true;
        } else if (flag === 'status-port') {
          this._parsePort(argv[++i]);
        } else {
          this.errors.push(`Unknown flag: ${arg}`);
        }
      } else if (arg === '-h') {
        this.help = true;
      } else {
        args.push(arg);
      }
    }

    if (this.help) {
      return;
    }

    if (args.length < 2 || args.length > 3) {
      this.errors.push('Expected 2-3 positional arguments: <manifest.json> <virtualPath> [outFile]');
      return;
    }

    this.manifestPath = args[0];
    this.virtualPath = args[1];
    this.outFile = args[2] ?? null;

    if (!this.virtualPath.includes('/')) {
      this.errors.push('Virtual path must look like <resource>/<file>');
    }
  }

  private _parsePort(value: string | undefined): void {
    if (value === undefined) {
      this.errors.push('--status-port needs a port number');
      return;
    }

    const port = parseInt(value, 10);
    if (isNaN(port) || String(port) !== value) {
      this.errors.push('Status port must be a number');
      return;
    }

    if (port < 0 || port > 65535) {
      this.errors.push('Status port must be between 0 and 65535');
      return;
    }

    this.statusPort = port;
  }

  isValid(): boolean {
    return this.errors.length === 0;
  }

  getErrorMessage(): string | null {
    if (this.errors.length === 0) {
      return null;
    }

    return '\n❌ ' + this.errors.join('\n❌ ') + '\n';
  }

  getUsageMessage(): string {
    return `
Usage: rcd [options] <manifest.json> <virtualPath> [outFile]

Options:
  --nonblocking        Read through the non-blocking mount and poll
  --bulk               Use bulk handles and absolute-offset reads
  --status-port <n>    Serve download progress on ws://localhost:<n>/ws/downloads
  -h, --help           Show this message

Examples:
  rcd manifest.json props/bench.ydr bench.ydr
  rcd --nonblocking manifest.json maps/downtown.ymap > downtown.ymap
`;
  }
}
