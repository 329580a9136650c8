import * as readline from 'readline';
import {
  FlowService,
  MemoryStorageAdapter,
  optionsFromEnv,
  silentLogger,
  toWireChatResponse,
} from '../src';

/**
 * Interactive demo of the flow engine
 * Saves a small graph the way the visual editor would, then chats with it
 */
async function demo() {
  console.log('=== Bot Flow Interactive Demo ===\n');

  const storageAdapter = new MemoryStorageAdapter();
  const service = new FlowService({
    storageAdapter,
    options: optionsFromEnv(),
    logger: silentLogger,
  });

  const bot = await storageAdapter.createBot({ name: 'Pizzería', ownerId: 'demo' });
  const saved = await service.saveEditorGraph(
    bot.id,
    {
      nodes: [
        { id: 'start', type: 'start', data: { label: '', message: '¡Bienvenido!' } },
        {
          id: 'menu',
          type: 'decision',
          data: { label: 'hola', message: '¿Quieres ver la carta o hacer un pedido?' },
        },
        { id: 'carta', type: 'message', data: { label: 'carta', message: 'Margarita 9€, Diavola 11€' } },
        { id: 'pedido', type: 'message', data: { label: 'pedido', message: '¿Qué pizza quieres?' } },
        { id: 'fin', type: 'end', data: { label: 'adiós', message: '¡Hasta pronto!' } },
      ],
      edges: [
        { id: 'e1', source: 'start', target: 'menu' },
        { id: 'e2', source: 'menu', target: 'carta', label: 'carta' },
        { id: 'e3', source: 'menu', target: 'pedido', label: 'pedido' },
        { id: 'e4', source: 'carta', target: 'fin' },
        { id: 'e5', source: 'pedido', target: 'fin' },
      ],
    },
    'demo'
  );
  console.log(`Graph saved: ${JSON.stringify(saved.stats)}\n`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const askUser = (prompt: string): Promise<string> => {
    return new Promise((resolve) => {
      rl.question(prompt, (answer) => {
        resolve(answer);
      });
    });
  };

  console.log('Type "exit" to quit, "wire" to see the last raw response\n');

  let last: ReturnType<typeof toWireChatResponse> | null = null;
  while (true) {
    const userInput = (await askUser('You: ')).trim();
    if (userInput === 'exit') break;
    if (userInput === 'wire') {
      console.log(JSON.stringify(last, null, 2));
      continue;
    }
    if (!userInput) continue;

    const result = await service.chat({
      botId: bot.id,
      message: userInput,
      contact: 'demo-contact',
    });
    last = toWireChatResponse(result);

    console.log(`Bot: ${result.response}`);
    if (result.isDecision) {
      result.options.forEach((option) => console.log(`  - ${option.label}`));
    }
  }

  const counters = await storageAdapter.read((reader) => reader.getBot(bot.id));
  console.log(`\nMessages handled: ${counters?.messageCount ?? 0}`);

  rl.close();
}

demo().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
