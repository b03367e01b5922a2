export * from './core/Config';
export * from './core/Constants';
export * from './core/Schemas';
export * from './helpers/TwitchHelper';
export * from './services/CampaignLoader';
export * from './services/TwitchApi';
export * from './services/TwitchQueries';
export * from './struct/Campaign';
export * from './struct/Drop';
export * from './struct/Game';
export * from './struct/TimedDrop';
export * from './struct/WatchProgress';
export * from './structures/HttpClient';
export * from './structures/LoggerClient';
export * from './structures/Memo';
export * from './structures/RuntimeClient';
