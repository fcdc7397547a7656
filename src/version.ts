export const NAME = 'wakatime-ls';
export const VERSION = '0.1.0';
