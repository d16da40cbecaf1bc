import { describe, it, expect } from 'vitest';
import { createDirectResponder } from './direct-responder.js';

describe('createDirectResponder', () => {
  const responder = (capabilities: string[] = []) =>
    createDirectResponder({ name: 'Switchboard', listCapabilities: () => capabilities });

  it('lists sorted, unique capabilities when asked for help', async () => {
    const response = await responder(['search', 'echo', 'search']).respond('help me', {});

    expect(response).toEqual({
      content: "I'm Switchboard. Registered agents can handle: echo, search.",
      metadata: { intent: 'help' },
    });
  });

  it('says so when no agents are registered', async () => {
    const response = await responder().respond('What can you do?', {});

    expect(response.content).toBe("I'm Switchboard. No specialized agents are registered yet.");
  });

  it('prefers help over a greeting in the same message', async () => {
    const response = await responder().respond('hi, help please', {});

    expect(response.metadata).toEqual({ intent: 'help' });
  });

  it('introduces itself', async () => {
    const response = await responder().respond('Who are you?', {});

    expect(response).toEqual({
      content: "I'm Switchboard, an assistant that coordinates specialized agents.",
      metadata: { intent: 'identity' },
    });
  });

  it('matches greetings as whole words only', async () => {
    expect((await responder().respond('Hey there', {})).metadata).toEqual({ intent: 'greeting' });
    expect((await responder().respond('this is a thin line', {})).content).toBe('Understood: this is a thin line');
  });
});
