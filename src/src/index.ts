export * from './notifications/errors/NotificationErrors.js';
export * from './notifications/interfaces/NotificationRecord.js';
export type * from './notifications/interfaces/RawMultipartMessage.js';
export type * from './notifications/interfaces/GapDetected.js';
export type * from './notifications/transport/ITransport.js';
export * from './notifications/classifier/FrameClassifier.js';
export * from './notifications/renderer/RenderMode.js';
export * from './notifications/renderer/PayloadRenderer.js';
export * from './notifications/dispatcher/DispatcherState.js';
export * from './notifications/dispatcher/SequenceTracker.js';
export * from './notifications/dispatcher/NotificationDispatcher.js';
export * from './zeromq/enums/BitcoinZeroMQTopic.js';
export * from './zeromq/ZeroMQEndpoint.js';
export * from './zeromq/ZeroMQTransport.js';
export * from './config/Config.js';
export * from './config/ListenerConfigManager.js';
export type * from './config/interfaces/IListenerConfig.js';
export * from './logger/Logger.js';
export * from './logger/enums/DebugLevel.js';
export * from './listener/ZeroMQListener.js';
