import * as readline from 'readline';
import config from './src/platform/config.js';
import { ChatStreamService } from './src/features/chat/usecases/ChatStreamService.js';
import { CancellationController } from './src/features/streaming/usecases/CancellationController.js';
import { ConnectionBroadcaster } from './src/features/streaming/usecases/ConnectionBroadcaster.js';
import { StreamRegistry } from './src/features/streaming/usecases/StreamRegistry.js';
import { OpenRouterStreamAdapter } from './src/infrastructure/ai/OpenRouterStreamAdapter.js';
import { InMemoryChatStore } from './src/infrastructure/memory/InMemoryChatStore.js';

// Streams replies for one mock chat session straight to the terminal
const CHAT_SESSION_ID = process.argv[2] ?? '1';

const provider = new OpenRouterStreamAdapter(config.openrouter);
const registry = new StreamRegistry();
const broadcaster = new ConnectionBroadcaster({
    queueCapacity: config.streaming.connectionQueueSize,
    maxConnectionsPerStream: config.streaming.maxConnectionsPerSession,
});
const chatService = new ChatStreamService({
    store: InMemoryChatStore.fromFile(config.mockData.chatSessionsPath),
    provider,
    registry,
    broadcaster,
    cancellation: new CancellationController(registry, broadcaster),
    isProviderConfigured: () => provider.isConfigured,
});

const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
});

async function reply(userInput: string): Promise<void> {
    const { connection } = await chatService.sendMessage(CHAT_SESSION_ID, userInput);
    process.stdout.write('\n> Assistant: ');

    for await (const event of connection) {
        switch (event.type) {
            case 'content':
                process.stdout.write(event.data);
                break;
            case 'done':
                process.stdout.write('\n');
                break;
            case 'error':
                process.stdout.write(`\n[error] ${event.error}\n`);
                break;
            case 'cancelled':
                process.stdout.write(`\n[cancelled: ${event.reason}]\n`);
                break;
            case 'user_message_saved':
                break;
        }
    }
}

function main(): void {
    console.log('=============================================');
    console.log('        Streaming Chat Relay - CLI Demo      ');
    console.log('=============================================');
    console.log(`Chat session ${CHAT_SESSION_ID}. Type your message and press Enter. (Type "exit" to quit)`);

    // Ctrl+C cancels the running reply instead of quitting
    rl.on('SIGINT', () => {
        const outcome = chatService.cancelMessage(CHAT_SESSION_ID);
        if (outcome.status === 'nothing_to_cancel') {
            rl.close();
        }
    });

    const askQuestion = () => {
        rl.question('\n> You: ', (userInput) => {
            if (userInput.toLowerCase() === 'exit') {
                console.log('Goodbye!');
                rl.close();
                return;
            }

            reply(userInput)
                .catch((error: unknown) => {
                    console.error('\n[Error]:', error instanceof Error ? error.message : error);
                })
                .finally(askQuestion);
        });
    };

    rl.on('close', () => {
        chatService.shutdown()
            .catch((error: unknown) => console.error('Shutdown failed:', error))
            .finally(() => process.exit(0));
    });

    askQuestion();
}

main();
