export { FormConfigurationEntity } from './form-configuration.entity';
export { ConversationSessionEntity } from './conversation-session.entity';
