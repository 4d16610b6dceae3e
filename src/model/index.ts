export * from './model-client';
export * from './model-registry';
export * from './openai-client';
export * from './model-node';
export * from './tools';
export * from './clean-response';
export * from './channels';
export * from './guidance';
