export const SDK_NAME = "taskwire-sdk"
export const SDK_VERSION = "1.0.0"
export const USER_AGENT = `${SDK_NAME}/${SDK_VERSION}`
