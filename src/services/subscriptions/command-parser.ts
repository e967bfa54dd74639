import { ISIN_LENGTH, PUSHER_ACTIONS, PUSHER_CHANNELS } from '../../config/constants.js';
import type { PusherAction, PusherChannel, PusherCommand } from '../../types/subscription.types.js';
import { ValidationError } from '../../utils/errors.js';

function parseAction(value: string): PusherAction {
  switch (value) {
    case PUSHER_ACTIONS.SUBSCRIBE:
      return 'subscribe';
    case PUSHER_ACTIONS.UNSUBSCRIBE:
      return 'unsubscribe';
    default:
      throw new ValidationError(`Action [${value}] is not acceptable`);
  }
}

function isPusherChannel(value: string): value is PusherChannel {
  return PUSHER_CHANNELS.some((channel) => channel === value);
}

/**
 * Parses `<action>.<channel>.<isin1>,<isin2>,...`, for instance
 * `1.trade.IRO1FOLD0001,IRO1IKCO0001`.
 */
export function parseCommand(message: string): PusherCommand {
  const parts = message.split('.');
  if (parts.length !== 3) {
    throw new ValidationError(`Message [${message}] has unacceptable format`);
  }

  const [actionPart, channelPart, isinPart] = parts;
  const action = parseAction(actionPart);

  if (!isPusherChannel(channelPart)) {
    throw new ValidationError(`Channel [${channelPart}] is not acceptable`);
  }

  const isins = isinPart.split(',');
  const invalid = isins.find((isin) => isin.length !== ISIN_LENGTH);
  if (invalid !== undefined) {
    throw new ValidationError(`Isin [${invalid}] is not acceptable`);
  }

  return { action, channel: channelPart, isins };
}
