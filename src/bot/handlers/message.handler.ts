import { bot } from '../bot.js';
import { dispatchEvent } from './workflow.dispatcher.js';

bot.on('message:text', async (ctx) => {
  // Unknown commands fall through here; known ones are handled in command.handler
  if (ctx.message.text.startsWith('/')) {
    return;
  }

  await dispatchEvent(ctx, {
    type: 'text',
    text: ctx.message.text,
    entities: ctx.message.entities,
  });
});

bot.on('message:photo', async (ctx) => {
  // Telegram lists sizes smallest first
  const largest = ctx.message.photo[ctx.message.photo.length - 1];
  if (!largest) {
    return;
  }

  await dispatchEvent(ctx, { type: 'photo', fileId: largest.file_id });
});
