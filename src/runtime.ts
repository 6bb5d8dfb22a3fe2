import type { DocscoutConfig } from './config.js';
import { CommandValidator } from './validator.js';
import { realpathResolver } from './path-guard.js';
import { SandboxedExecutor } from './executor.js';
import { AuditLogger, AuditSink, ConsoleAuditSink, JsonlAuditSink } from './audit.js';
import { SessionManager, SessionStorage } from './sessions/index.js';
import { Orchestrator, createMarkerClassifier } from './orchestrator/index.js';
import {
  AgentFactory,
  createOpenAIAgentFactory,
  createOpenAIClient,
  openAICompletionClient,
} from './agent/openai-agent.js';
import { buildSystemPrompt } from './agent/prompt.js';
import { ChatService } from './chat-service.js';
import { logger } from './logger.js';

/**
 * Every long-lived component, wired from one configuration
 */
export interface Runtime {
  config: DocscoutConfig;
  validator: CommandValidator;
  executor: SandboxedExecutor;
  audit: AuditLogger;
  sessions: SessionManager;
  orchestrator: Orchestrator;
  chat: ChatService;
  /** Stop the sweeper, kill running commands and flush the audit trail */
  shutdown(): Promise<void>;
}

export interface RuntimeOptions {
  /** Defaults to the OpenAI agent configured from the environment */
  agentFactory?: AgentFactory;
  auditSink?: AuditSink;
}

function defaultAuditSink(config: DocscoutConfig): AuditSink {
  return config.audit.sink === 'console'
    ? new ConsoleAuditSink()
    : new JsonlAuditSink(config.audit.path);
}

export function createRuntime(config: DocscoutConfig, options: RuntimeOptions = {}): Runtime {
  const validator = new CommandValidator(config.document_root, {
    maxCommandLength: config.validator.max_command_length,
    resolveLinks: realpathResolver(),
  });

  const executor = new SandboxedExecutor({
    root: validator.getRoot(),
    timeoutMs: config.executor.timeout_ms,
    maxOutputBytes: config.executor.max_output_bytes,
    maxConcurrent: config.executor.max_concurrent,
  });

  const audit = new AuditLogger(options.auditSink ?? defaultAuditSink(config));

  const sessions = new SessionManager({
    idleTimeoutS: config.session.idle_timeout_s,
    expireTimeoutS: config.session.expire_timeout_s,
    sweepIntervalS: config.session.sweep_interval_s,
    storage: config.session.sessions_dir ? new SessionStorage(config.session.sessions_dir) : undefined,
  });

  const orchestrator = new Orchestrator({
    validator,
    executor,
    audit,
    classifier: createMarkerClassifier({
      thinkingMarkers: config.orchestrator.thinking_markers,
      finalMarker: config.orchestrator.final_marker,
    }),
    maxSteps: config.orchestrator.max_steps,
  });

  const agentFactory = options.agentFactory ?? createOpenAIAgentFactory({
    client: openAICompletionClient(createOpenAIClient()),
    llm: config.llm,
    systemPrompt: buildSystemPrompt(config.orchestrator.final_marker),
  });

  const chat = new ChatService({ sessions, orchestrator, agentFactory });

  return {
    config,
    validator,
    executor,
    audit,
    sessions,
    orchestrator,
    chat,
    shutdown: async () => {
      sessions.stop();
      const killed = executor.killAll();
      if (killed > 0) {
        logger.info(`Killed ${killed} running command(s)`);
      }
      await audit.close();
    },
  };
}
