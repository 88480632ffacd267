/**
 * User facing notifications sent through `CloudClient.userMessage`.
 */

export const USER_MESSAGE_ID = 'cloud_subscription_expired'

export const USER_MESSAGE_TITLE = 'Cloud'

export const MESSAGE_EXPIRATION = `It looks like your cloud subscription has expired. Please check
your account page to continue using the service.`

export const MESSAGE_AUTH_FAIL = `You have been logged out of the cloud because we have been unable
to verify your credentials. Please log in again to continue using the service.`

export const NOTIFICATION_MESSAGE_ID = 'cloud_relay_notification'
