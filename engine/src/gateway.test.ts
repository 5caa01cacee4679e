import { extractJSON, ProviderGateway } from './gateway';
import { LLMProvider, OfflineProvider } from './llm-providers';
import { collectEvents } from './test-utils';

class FakeProvider implements LLMProvider {
  constructor(private reply: () => Promise<string>) {}

  complete(): Promise<string> {
    return this.reply();
  }
}

describe('extractJSON', () => {
  it('should parse a bare object', () => {
    expect(extractJSON('{"score": 8}')).toEqual({ score: 8 });
  });

  it('should unwrap code fences and surrounding prose', () => {
    const text = 'Here you go:\n```json\n{"status": "valid", "score": 9}\n```\nAnything else?';
    expect(extractJSON(text)).toEqual({ status: 'valid', score: 9 });
  });

  it('should return null for arrays, garbage and empty text', () => {
    expect(extractJSON('[1, 2]')).toBeNull();
    expect(extractJSON('{not json}')).toBeNull();
    expect(extractJSON('')).toBeNull();
  });
});

describe('ProviderGateway', () => {
  it('should return the parsed reply', async () => {
    const gateway = new ProviderGateway(new FakeProvider(async () => '{"ok": true}'), 1000);
    await expect(gateway.extractStructured('sys', 'user')).resolves.toEqual({ ok: true });
  });

  it('should turn provider errors into null and report the fallback', async () => {
    const { events, emit } = collectEvents();
    const gateway = new ProviderGateway(new OfflineProvider(), 1000, emit);

    await expect(gateway.extractStructured('sys', 'user', 'capabilities')).resolves.toBeNull();
    expect(events).toEqual([
      { type: 'llm_fallback', caller: 'capabilities', error: 'offline provider: no model configured' },
    ]);
  });

  it('should report replies that are not JSON objects', async () => {
    const { events, emit } = collectEvents();
    const gateway = new ProviderGateway(new FakeProvider(async () => 'I cannot help with that'), 1000, emit);

    await expect(gateway.extractStructured('sys', 'user', 'validate')).resolves.toBeNull();
    expect(events).toEqual([{ type: 'llm_fallback', caller: 'validate', error: 'response was not a JSON object' }]);
  });

  it('should give up after the timeout and abort the request', async () => {
    const { events, emit } = collectEvents();
    let received: AbortSignal | undefined;
    const hanging: LLMProvider = {
      complete: (_system, _user, signal) => {
        received = signal;
        return new Promise<string>(() => undefined);
      },
    };
    const gateway = new ProviderGateway(hanging, 20, emit);

    await expect(gateway.extractStructured('sys', 'user', 'codegen')).resolves.toBeNull();
    expect(events).toEqual([{ type: 'llm_fallback', caller: 'codegen', error: 'LLM call timed out after 20ms' }]);
    expect(received?.aborted).toBe(true);
  });

  it('should pass a live signal to calls that finish in time', async () => {
    let received: AbortSignal | undefined;
    const quick: LLMProvider = {
      complete: async (_system, _user, signal) => {
        received = signal;
        return '{"ok": true}';
      },
    };
    const gateway = new ProviderGateway(quick, 1000);

    await expect(gateway.extractStructured('sys', 'user')).resolves.toEqual({ ok: true });
    expect(received?.aborted).toBe(false);
  });
});
