import { promises as fs } from 'node:fs';
import { ChatService, parseChatRequest } from '../../src/chat-service.js';
import { Orchestrator } from '../../src/orchestrator/index.js';
import { CommandValidator } from '../../src/validator.js';
import { SandboxedExecutor } from '../../src/executor.js';
import { AuditLogger } from '../../src/audit.js';
import { SessionManager } from '../../src/sessions/index.js';
import {
  MalformedRequestError,
  SessionBusyError,
  SessionExpiredError,
} from '../../src/errors.js';
import type { ScriptStep } from '../fixtures/create-test-agent.js';
import {
  MemoryAuditSink,
  collect,
  command,
  createDocsDir,
  createTestAgent,
  text,
} from '../fixtures/create-test-agent.js';

describe('parseChatRequest', () => {
  it('accepts a message with optional fields', () => {
    expect(parseChatRequest({ message: 'hi' })).toEqual({ message: 'hi' });
    expect(parseChatRequest({ message: ' hi ', session_id: 'abc_1', debug_mode: true })).toEqual({
      message: 'hi',
      session_id: 'abc_1',
      debug_mode: true,
    });
  });

  it('rejects malformed bodies', () => {
    expect(() => parseChatRequest({ message: '   ' })).toThrow(
      new MalformedRequestError('message: message must not be empty')
    );
    expect(() => parseChatRequest({ message: 'hi', session_id: 'has space' })).toThrow(MalformedRequestError);
    expect(() => parseChatRequest('hi')).toThrow(MalformedRequestError);
  });
});

describe('ChatService', () => {
  let root: string;
  let sessions: SessionManager;
  let script: ScriptStep[];
  let service: ChatService;

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    root = await createDocsDir({ 'a.txt': 'hello\n' });
    sessions = new SessionManager();
    script = [text('Answer', 'final')];
    service = new ChatService({
      sessions,
      orchestrator: new Orchestrator({
        validator: new CommandValidator(root),
        executor: new SandboxedExecutor({ root }),
        audit: new AuditLogger(new MemoryAuditSink()),
      }),
      agentFactory: () => createTestAgent(script),
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('claims the session until the turn is closed', async () => {
    const turn = await service.open({ message: 'hi', session_id: 's1' });
    expect(turn.session.isBusy).toBe(true);
    await expect(service.open({ message: 'again', session_id: 's1' })).rejects.toThrow(SessionBusyError);

    await collect(turn.stream());
    await turn.close();
    await turn.close();

    expect(turn.session.turns.map(t => `${t.role}:${t.content}`)).toEqual(['user:hi', 'agent:Answer']);

    expect(turn.session.isBusy).toBe(false);
    const next = await service.open({ message: 'again', session_id: 's1' });
    expect(next.session).toBe(turn.session);
    await next.close();
  });

  it('creates a session when none is named', async () => {
    const turn = await service.open({ message: 'hi' });
    expect(turn.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(turn.debug).toBe(false);
    await turn.close();
  });

  it('refuses an expired session', async () => {
    const turn = await service.open({ message: 'hi', session_id: 's1' });
    await turn.close();
    await sessions.expire('s1');

    await expect(service.open({ message: 'hi', session_id: 's1' })).rejects.toThrow(SessionExpiredError);
  });

  it('summarizes a whole turn', async () => {
    script = [command('cat a.txt'), command('rm -rf /'), text('It says hello', 'final')];

    const summary = await service.chat({ message: 'What is in a.txt?', session_id: 's1' });

    expect(summary).toEqual({
      session_id: 's1',
      response: 'It says hello',
      commands_executed: ['cat a.txt'],
      outputs: ['hello\n', "Security error: verb_not_allowed ('rm' is not an allowed command)"],
    });
    expect((await sessions.find('s1')).isBusy).toBe(false);
  });

  it('uses the error as the response when the turn fails', async () => {
    script = [new Error('model unavailable')];
    const summary = await service.chat({ message: 'hi' });
    expect(summary.response).toBe('model unavailable');
    expect(summary.commands_executed).toEqual([]);
  });
});
