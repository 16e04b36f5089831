import type { AppContext } from '../lib/app.js';
import { failCommand, openApp } from './shared.js';

export async function ask(question: string): Promise<void> {
  let app: AppContext | undefined;
  try {
    app = await openApp({ readOnly: true });
    const { reply } = await app.assembler.ask(question);
    console.log(reply);
  } catch (error) {
    failCommand('ask', error);
  } finally {
    await app?.close();
  }
}
