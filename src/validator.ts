import path from 'node:path';
import { parse as shellParse } from 'shell-quote';
import { Decision, RejectionReason } from './types.js';
import { isWithinRoot, LinkResolver } from './path-guard.js';
import { errorMessage } from './errors.js';

// ============================================
// Policy
// ============================================

/**
 * Read-only verbs the agent may run. Fixed; not configurable.
 */
export const ALLOWED_VERBS: ReadonlySet<string> = new Set([
  'ls', 'tree', 'find', 'cat', 'head', 'tail', 'less', 'more',
  'grep', 'rg', 'awk', 'cut', 'sort', 'uniq', 'wc',
  'file', 'stat', 'du', 'pwd',
]);

export const DEFAULT_MAX_COMMAND_LENGTH = 1000;

/**
 * Sequences that chain, substitute or redirect. Matched against the raw
 * string, quoted or not.
 */
const DANGEROUS_PATTERNS: ReadonlyArray<{ pattern: RegExp; label: string }> = [
  { pattern: /;/, label: ';' },
  { pattern: /&&/, label: '&&' },
  { pattern: /\|\|/, label: '||' },
  { pattern: /`/, label: '`' },
  { pattern: /\$\(/, label: '$(' },
  { pattern: /\)/, label: ')' },
  { pattern: /\|/, label: '|' },
  { pattern: />>/, label: '>>' },
  { pattern: />/, label: '>' },
  { pattern: /</, label: '<' },
  { pattern: /&\s*$/, label: 'trailing &' },
];

/** find primaries that execute, delete or write files */
const FIND_FORBIDDEN = new Set([
  '-exec', '-execdir', '-ok', '-okdir', '-delete',
  '-fprint', '-fprint0', '-fprintf', '-fls',
]);

/** awk options that read program text or extensions from files */
const AWK_SOURCE_OPTIONS = ['--file', '--exec', '--include', '--load'];

function isAwkSourceOption(arg: string): boolean {
  if (AWK_SOURCE_OPTIONS.some(option => arg === option || arg.startsWith(`${option}=`))) {
    return true;
  }
  return /^-[fEil]/.test(arg);
}

export interface ValidatorOptions {
  maxCommandLength?: number;
  /**
   * Canonicalizes paths (follows symlinks). Without it only lexical
   * resolution is performed and validation touches nothing on disk.
   */
  resolveLinks?: LinkResolver;
}

// ============================================
// Tokenizer
// ============================================

export type TokenizeResult =
  | { ok: true; tokens: string[]; operators: string[] }
  | { ok: false; detail: string };

/**
 * Find an unterminated quote or a dangling escape
 */
function findQuotingProblem(raw: string): string | null {
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      continue;
    }
    if (ch === '\\') {
      if (i === raw.length - 1) {
        return 'trailing escape character';
      }
      i++;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    }
  }

  if (quote) {
    return `unterminated ${quote === '"' ? 'double' : 'single'} quote`;
  }
  return null;
}

/**
 * Quote-aware split of a command line into argv.
 * Variables are kept literal since nothing expands them.
 * Shell control operators are returned separately from the argv.
 */
export function tokenize(raw: string): TokenizeResult {
  const problem = findQuotingProblem(raw);
  if (problem) {
    return { ok: false, detail: problem };
  }

  try {
    return splitEntries(raw);
  } catch (error) {
    // shell-quote throws on constructs such as an unclosed ${
    return { ok: false, detail: errorMessage(error) };
  }
}

function splitEntries(raw: string): TokenizeResult {
  const tokens: string[] = [];
  const operators: string[] = [];

  for (const entry of shellParse(raw, (name: string) => `$${name}`)) {
    if (typeof entry === 'string') {
      tokens.push(entry);
    } else if ('comment' in entry) {
      return { ok: false, detail: `ambiguous comment: #${entry.comment}` };
    } else if (entry.op === 'glob') {
      // No shell expands globs; the pattern reaches the verb verbatim
      tokens.push(entry.pattern);
    } else {
      operators.push(entry.op);
    }
  }

  return { ok: true, tokens, operators };
}

// ============================================
// Rules
// ============================================

function reject(reason: RejectionReason, detail: string, tokens: string[] = []): Decision {
  return { allowed: false, reason, detail, tokens };
}

function looksLikePath(value: string): boolean {
  return value !== '' && (value.includes('/') || value.startsWith('.'));
}

/**
 * Pick the parts of an argument that may name a file. Besides plain operands
 * that is the value of `--flag=value`, and for a short option bundle such as
 * `-f/etc/passwd` or `-rf../x` the tail after each option letter.
 */
function pathCandidates(arg: string): string[] {
  if (!arg.startsWith('-')) {
    return [arg];
  }

  if (arg.startsWith('--')) {
    const eq = arg.indexOf('=');
    const value = eq === -1 ? '' : arg.slice(eq + 1);
    return looksLikePath(value) ? [value] : [];
  }

  const candidates: string[] = [];
  for (let i = 2; i < arg.length && /[A-Za-z0-9]/.test(arg[i - 1]); i++) {
    const tail = arg.slice(i);
    if (looksLikePath(tail)) {
      candidates.push(tail);
    }
  }
  return candidates;
}

function checkPaths(args: string[], root: string, resolveLinks?: LinkResolver): string | null {
  const canonicalRoot = resolveLinks ? resolveLinks(root) : root;

  for (const arg of args) {
    for (const candidate of pathCandidates(arg)) {
      const escape = checkPath(arg, candidate, root, canonicalRoot, resolveLinks);
      if (escape) {
        return escape;
      }
    }
  }

  return null;
}

function checkPath(
  arg: string,
  candidate: string,
  root: string,
  canonicalRoot: string,
  resolveLinks?: LinkResolver
): string | null {
  const resolved = path.resolve(root, candidate);
  if (!isWithinRoot(root, resolved)) {
    return `${arg} resolves outside the document root`;
  }

  if (resolveLinks) {
    let canonical: string;
    try {
      canonical = resolveLinks(resolved);
    } catch {
      return `${arg} could not be resolved`;
    }
    if (!isWithinRoot(canonicalRoot, canonical)) {
      return `${arg} links outside the document root`;
    }
  }

  return null;
}

/**
 * Verb-specific options that run programs or write files
 */
function checkOptions(verb: string, args: string[]): string | null {
  switch (verb) {
    case 'find': {
      const primary = args.find(arg => FIND_FORBIDDEN.has(arg));
      return primary ? `find ${primary} is not allowed` : null;
    }

    case 'awk': {
      const loader = args.find(isAwkSourceOption);
      if (loader) {
        return `awk ${loader} is not allowed`;
      }
      const program = args.join(' ');
      if (/\bsystem\s*\(/.test(program)) {
        return 'awk system() is not allowed';
      }
      if (/\bgetline\b/.test(program)) {
        return 'awk getline is not allowed';
      }
      const builtin = /\b(ARGV|ARGC|ENVIRON)\b/.exec(program);
      if (builtin) {
        return `awk ${builtin[1]} is not allowed`;
      }
      const directive = /@(include|load)\b/.exec(program);
      if (directive) {
        return `awk @${directive[1]} is not allowed`;
      }
      return null;
    }

    case 'rg': {
      const pre = args.find(arg => arg === '--pre' || arg.startsWith('--pre='));
      return pre ? 'rg --pre is not allowed' : null;
    }

    case 'sort': {
      const output = args.find(arg =>
        arg === '--output' ||
        arg.startsWith('--output=') ||
        arg.startsWith('--compress-program') ||
        /^-[a-zA-Z]*o/.test(arg)
      );
      return output ? `sort ${output} writes files` : null;
    }

    case 'tree':
    case 'less': {
      const output = args.find(arg => arg === '-o' || arg === '-O' || arg.startsWith('--log-file'));
      return output ? `${verb} ${output} writes files` : null;
    }

    case 'uniq': {
      const operands = args.filter(arg => !arg.startsWith('-'));
      return operands.length > 1 ? 'uniq with an output file operand is not allowed' : null;
    }

    default:
      return null;
  }
}

// ============================================
// Validator
// ============================================

/**
 * Decide whether `raw` may run inside `root`. Rules apply in order and the
 * first failure wins. Never spawns a process and never logs.
 */
export function validateCommand(
  raw: string,
  root: string,
  options: ValidatorOptions = {}
): Decision {
  const maxLength = options.maxCommandLength ?? DEFAULT_MAX_COMMAND_LENGTH;
  const command = raw.trim();

  // 1. Length
  if (command === '') {
    return reject(RejectionReason.EMPTY, 'empty command');
  }
  if (command.length > maxLength) {
    return reject(RejectionReason.TOO_LONG, `command exceeds ${maxLength} characters`);
  }

  // 2. Tokenization
  const tokenized = tokenize(command);
  if (!tokenized.ok) {
    return reject(RejectionReason.MALFORMED, tokenized.detail);
  }
  const { tokens, operators } = tokenized;

  // 3. Verb whitelist
  const [verb, ...args] = tokens;
  if (verb === undefined || !ALLOWED_VERBS.has(verb)) {
    return reject(RejectionReason.VERB_NOT_ALLOWED, `'${verb ?? ''}' is not an allowed command`, tokens);
  }

  // 4. Chaining, substitution, redirection
  const dangerous = DANGEROUS_PATTERNS.find(({ pattern }) => pattern.test(command));
  if (dangerous) {
    return reject(RejectionReason.DANGEROUS_PATTERN, `contains '${dangerous.label}'`, tokens);
  }
  if (operators.length > 0) {
    return reject(RejectionReason.DANGEROUS_PATTERN, `contains '${operators[0]}'`, tokens);
  }

  // 5. Paths stay inside the root
  const escape = checkPaths(args, path.resolve(root), options.resolveLinks);
  if (escape) {
    return reject(RejectionReason.PATH_ESCAPE, escape, tokens);
  }

  // 6. Options that execute or write
  const forbidden = checkOptions(verb, args);
  if (forbidden) {
    return reject(RejectionReason.FORBIDDEN_OPTION, forbidden, tokens);
  }

  return { allowed: true, tokens };
}

/**
 * Validator bound to one document root
 */
export class CommandValidator {
  private readonly root: string;
  private readonly options: ValidatorOptions;

  constructor(root: string, options: ValidatorOptions = {}) {
    this.root = path.resolve(root);
    this.options = options;
  }

  getRoot(): string {
    return this.root;
  }

  validate(raw: string): Decision {
    return validateCommand(raw, this.root, this.options);
  }
}
