/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Scriptable language server speaking Content-Length framed JSON-RPC on
 * stdio. Behaviour is selected with command-line flags, see parseMode.
 */

type JsonRpcId = number | string;

type IncomingMessage = {
  id?: JsonRpcId;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: unknown;
};

type StubSnippet = {
  id: number;
  title: string;
  language: string;
  content: string;
  tags?: string[];
};

type StubMode = {
  emptyCapabilities: boolean;
  initializeError: boolean;
  notifyAround: boolean;
  stderrChatter: boolean;
  ignoreSigterm: boolean;
  contentType: boolean;
  refuseShutdown: boolean;
  universalSnippets: boolean;
  filterByWord: boolean;
  neverRespond: Set<string>;
  garbageBefore: Set<string>;
  exitOn: Set<string>;
  delays: Map<string, number>;
};

const SNIPPETS: StubSnippet[] = [
  { id: 1, title: 'hello-shell', language: 'sh', content: 'echo "hello"' },
  { id: 2, title: 'list-files', language: 'sh', content: 'ls -la' },
  { id: 3, title: 'py-main', language: 'python', content: 'def main(): ...' },
];

// Offered for every language with --universal-snippets.
const UNIVERSAL_SNIPPETS: StubSnippet[] = [
  { id: 4, title: 'todo-note', language: '', content: 'TODO: ', tags: ['universal'] },
  { id: 5, title: 'test-banner', language: '', content: '=== test ===', tags: ['universal'] },
];

const COMMANDS = [
  'x.test',
  'bkmr.getSnippet',
  'bkmr.listSnippets',
  'fail.command',
];

const mode = parseMode(process.argv.slice(2));
const documents = new Map<string, string>();
const languages = new Map<string, string>();
const clientReplies = new Map<JsonRpcId, (reply: IncomingMessage) => void>();
let serverRequestCounter = 0;
let buffer: Buffer = Buffer.alloc(0);

function parseMode(args: string[]): StubMode {
  const parsed: StubMode = {
    emptyCapabilities: false,
    initializeError: false,
    notifyAround: false,
    stderrChatter: false,
    ignoreSigterm: false,
    contentType: false,
    refuseShutdown: false,
    universalSnippets: false,
    filterByWord: false,
    neverRespond: new Set(),
    garbageBefore: new Set(),
    exitOn: new Set(),
    delays: new Map(),
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next = args[i + 1] ?? '';

    switch (arg) {
      case '--empty-capabilities':
        parsed.emptyCapabilities = true;
        break;
      case '--initialize-error':
        parsed.initializeError = true;
        break;
      case '--notify-around':
        parsed.notifyAround = true;
        break;
      case '--stderr-chatter':
        parsed.stderrChatter = true;
        break;
      case '--ignore-sigterm':
        parsed.ignoreSigterm = true;
        break;
      case '--content-type':
        parsed.contentType = true;
        break;
      case '--refuse-shutdown':
        parsed.refuseShutdown = true;
        break;
      case '--universal-snippets':
        parsed.universalSnippets = true;
        break;
      case '--filter-by-word':
        parsed.filterByWord = true;
        break;
      case '--never-respond':
        parsed.neverRespond.add(next);
        i += 1;
        break;
      case '--garbage-before':
        parsed.garbageBefore.add(next);
        i += 1;
        break;
      case '--exit-on':
        parsed.exitOn.add(next);
        i += 1;
        break;
      case '--delay': {
        // --delay <method>=<ms>
        const [method, ms] = next.split('=');
        const value = Number(ms);
        if (method && Number.isFinite(value)) {
          parsed.delays.set(method, value);
        }
        i += 1;
        break;
      }
      default:
        break;
    }
  }

  return parsed;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function writeFrame(body: string): void {
  const length = Buffer.byteLength(body, 'utf8');
  const contentType = mode.contentType
    ? 'Content-Type: application/vscode-jsonrpc; charset=utf-8\r\n'
    : '';
  process.stdout.write(`Content-Length: ${length}\r\n${contentType}\r\n${body}`);
}

function send(message: Record<string, unknown>): void {
  writeFrame(JSON.stringify({ jsonrpc: '2.0', ...message }));
}

function respond(id: JsonRpcId, result: unknown): void {
  send({ id, result });
}

function respondError(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: unknown,
): void {
  send({ id, error: data === undefined ? { code, message } : { code, message, data } });
}

function notify(method: string, params: unknown): void {
  send({ method, params });
}

function chatter(line: string): void {
  if (mode.stderrChatter) {
    process.stderr.write(`${line}\n`);
  }
}

function askClient(method: string, params: unknown): Promise<IncomingMessage> {
  serverRequestCounter += 1;
  const id = `srv-${serverRequestCounter}`;
  return new Promise((resolve) => {
    clientReplies.set(id, resolve);
    send({ id, method, params });
  });
}

function capabilities(): Record<string, unknown> {
  if (mode.emptyCapabilities) {
    return {};
  }
  return {
    textDocumentSync: 1,
    completionProvider: { triggerCharacters: [':'] },
    executeCommandProvider: { commands: COMMANDS },
  };
}

function executeCommand(id: JsonRpcId, params: unknown): void {
  const record = asRecord(params);
  const command = typeof record['command'] === 'string' ? record['command'] : '';
  const args = Array.isArray(record['arguments']) ? record['arguments'] : [];
  const first = asRecord(args[0]);

  switch (command) {
    case 'x.test':
      respond(id, { ok: true });
      return;
    case 'bkmr.getSnippet': {
      const snippet = SNIPPETS.find((entry) => entry.id === first['id']);
      if (snippet === undefined) {
        respondError(id, -32602, `Snippet ${String(first['id'])} not found`);
        return;
      }
      chatter('INFO bkmr::lsp: Successfully retrieved snippet');
      respond(id, snippet);
      return;
    }
    case 'bkmr.listSnippets': {
      const language = first['language'];
      const snippets =
        typeof language === 'string'
          ? SNIPPETS.filter((entry) => entry.language === language)
          : SNIPPETS;
      chatter(`INFO bkmr::lsp: ${snippets.length} snippets found`);
      respond(id, { snippets });
      return;
    }
    case 'fail.command':
      respondError(id, -32000, 'command failed', { reason: 'test' });
      return;
    default:
      respondError(id, -32601, `Unknown command ${command}`);
  }
}

/** The identifier-like word that ends right before the position. */
function wordBefore(text: string, position: Record<string, unknown>): string {
  const line = typeof position['line'] === 'number' ? position['line'] : 0;
  const character =
    typeof position['character'] === 'number' ? position['character'] : 0;
  const prefix = (text.split('\n')[line] ?? '').slice(0, character);
  return /[A-Za-z0-9_-]*$/.exec(prefix)?.[0] ?? '';
}

function completion(id: JsonRpcId, params: unknown): void {
  const record = asRecord(params);
  const textDocument = asRecord(record['textDocument']);
  const uri = typeof textDocument['uri'] === 'string' ? textDocument['uri'] : '';
  const language = languages.get(uri);
  let candidates = SNIPPETS.filter((entry) => entry.language === language);
  if (mode.universalSnippets) {
    candidates = [...candidates, ...UNIVERSAL_SNIPPETS];
  }
  if (mode.filterByWord) {
    const word = wordBefore(documents.get(uri) ?? '', asRecord(record['position']));
    chatter(`DEBUG bkmr::lsp: snippet filter query '${word}'`);
    candidates = candidates.filter((entry) =>
      entry.title.toLowerCase().includes(word.toLowerCase()),
    );
  }
  const items = candidates.map((entry) => ({
    label: entry.title,
    kind: 15,
    detail: entry.content,
    ...(mode.universalSnippets
      ? { data: { tags: entry.tags ?? [entry.language] } }
      : {}),
  }));
  respond(id, { isIncomplete: false, items });
}

function trackDocument(method: string, params: unknown): void {
  const record = asRecord(params);
  const textDocument = asRecord(record['textDocument']);
  const uri = typeof textDocument['uri'] === 'string' ? textDocument['uri'] : '';

  if (method === 'textDocument/didOpen') {
    documents.set(uri, String(textDocument['text'] ?? ''));
    languages.set(uri, String(textDocument['languageId'] ?? ''));
    notify('textDocument/publishDiagnostics', {
      uri,
      version: textDocument['version'],
      diagnostics: [],
    });
    return;
  }

  if (method === 'textDocument/didChange') {
    const changes = Array.isArray(record['contentChanges'])
      ? record['contentChanges']
      : [];
    const last = asRecord(changes[changes.length - 1]);
    documents.set(uri, String(last['text'] ?? ''));
    notify('textDocument/publishDiagnostics', {
      uri,
      version: textDocument['version'],
      diagnostics: [],
    });
    return;
  }

  if (method === 'textDocument/didClose') {
    documents.delete(uri);
    languages.delete(uri);
  }
}

async function handleRequest(
  id: JsonRpcId,
  method: string,
  params: unknown,
): Promise<void> {
  chatter(`DEBUG bkmr::lsp: Executing ${method}`);

  if (mode.exitOn.has(method)) {
    process.exit(5);
  }
  if (mode.neverRespond.has(method)) {
    return;
  }

  const delay = mode.delays.get(method);
  if (delay !== undefined) {
    await sleep(delay);
  }

  if (mode.garbageBefore.has(method)) {
    writeFrame('{"jsonrpc": "2.0", "id": ');
  }

  if (mode.notifyAround) {
    notify('window/logMessage', { type: 3, message: `before ${method}` });
  }

  switch (method) {
    case 'initialize':
      if (mode.initializeError) {
        respondError(id, -32603, 'initialization refused');
        break;
      }
      respond(id, {
        capabilities: capabilities(),
        serverInfo: { name: 'stub-lsp-server', version: '0.1.0' },
      });
      break;
    case 'shutdown':
      if (mode.refuseShutdown) {
        respondError(id, -32600, 'shutdown refused');
        break;
      }
      respond(id, null);
      break;
    case 'workspace/executeCommand':
      executeCommand(id, params);
      break;
    case 'textDocument/completion':
      completion(id, params);
      break;
    case 'test/echo':
      respond(id, { echo: params ?? null });
      break;
    case 'test/ask-client': {
      const reply = await askClient('workspace/configuration', {
        items: [{ section: 'stub' }],
      });
      respond(id, { clientReply: reply });
      break;
    }
    default:
      respondError(id, -32601, `Unhandled method ${method}`);
  }

  if (mode.notifyAround) {
    notify('window/logMessage', { type: 3, message: `after ${method}` });
  }
}

function dispatch(message: IncomingMessage): void {
  const { id, method } = message;

  if (method === undefined) {
    // A reply to something we asked the client.
    if (id !== undefined) {
      const resolve = clientReplies.get(id);
      clientReplies.delete(id);
      resolve?.(message);
    }
    return;
  }

  if (id === undefined) {
    if (method === 'exit') {
      process.exit(0);
    }
    trackDocument(method, message.params);
    return;
  }

  void handleRequest(id, method, message.params);
}

function parseMessage(body: string): IncomingMessage | null {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return null;
  }
  const record = asRecord(payload);
  const id = record['id'];
  const method = record['method'];
  return {
    id: typeof id === 'number' || typeof id === 'string' ? id : undefined,
    method: typeof method === 'string' ? method : undefined,
    params: record['params'],
    result: record['result'],
    error: record['error'],
  };
}

function drainInput(): void {
  while (true) {
    const headerEnd = buffer.indexOf('\r\n\r\n');
    if (headerEnd < 0) {
      return;
    }
    const header = buffer.subarray(0, headerEnd).toString('ascii');
    const match = /Content-Length:\s*(\d+)/i.exec(header);
    const bodyStart = headerEnd + 4;
    if (match === null) {
      buffer = buffer.subarray(bodyStart);
      continue;
    }
    const length = Number(match[1]);
    if (buffer.length < bodyStart + length) {
      return;
    }
    const body = buffer.subarray(bodyStart, bodyStart + length).toString('utf8');
    buffer = buffer.subarray(bodyStart + length);
    const message = parseMessage(body);
    if (message !== null) {
      dispatch(message);
    }
  }
}

if (mode.ignoreSigterm) {
  process.on('SIGTERM', () => {
    chatter('WARN stub: ignoring SIGTERM');
  });
  // Stay alive after stdin closes so only SIGKILL ends the process.
  setInterval(() => undefined, 60_000);
}

process.stdin.on('data', (chunk: Buffer) => {
  buffer = Buffer.concat([buffer, chunk]);
  drainInput();
});

process.stdin.on('end', () => {
  if (!mode.ignoreSigterm) {
    process.exit(0);
  }
});

chatter('INFO bkmr::lsp: starting stub server');
chatter('WARN bkmr::lsp: no database configured, using fixtures');
chatter(`INFO bkmr::lsp: Successfully loaded ${SNIPPETS.length} snippets`);
