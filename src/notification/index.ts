import * as Logging from '../logging';
import * as Discord from './discord';
import { NotificationMessage, Notifier } from './types';

export interface NotificationConfig {
    webhookUrl?: string;
}

const disabled = (): Notifier => {
    const logger = Logging.getLogger();
    return {
        enabled: false,
        notify: async ({ title }: NotificationMessage): Promise<boolean> => {
            logger.debug('Notifications disabled, not announcing "%s"', title);
            return false;
        },
    };
};

export const create = (config: NotificationConfig): Notifier =>
    config.webhookUrl ? Discord.create({ webhookUrl: config.webhookUrl }) : disabled();

export type { NotificationMessage, Notifier } from './types';
export type { DiscordConfig } from './discord';
export { create as createDiscord, headline } from './discord';
