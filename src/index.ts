/**
 * IAM user onboarding
 *
 * Library surface for the user creation notification flow. Deployed through
 * the CDK app in infrastructure/; the Lambda entry point lives in
 * src/handlers/identity/.
 */

export { UserCreationNotifier, toResult } from './services/identity/UserCreationNotifier';
export type { UserCreationNotifierDeps } from './services/identity/UserCreationNotifier';
export { PrincipalDirectoryService, findTagValue } from './services/identity/PrincipalDirectoryService';
export { EmailParameterService } from './services/identity/EmailParameterService';
export { TemporaryPasswordService } from './services/identity/TemporaryPasswordService';
export { Logger } from './services/core/Logger';
export * from './types/OnboardingTypes';
export * from './types/OnboardingErrors';
export { extractUserName, CreationEventSchema } from './types/CreationEventSchema';
export * from './config/onboardingConfig';
export { UserOnboardingStack } from './stacks/UserOnboardingStack';
