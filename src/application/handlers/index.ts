export { login, logout, addUser, LoginBodySchema, AddUserBodySchema } from './account';
export { hello, goodbye, publicContent, simulatedError, stats } from './demo';
export { parseBody, parseJsonObject, parseForm, validate, mediaType } from './body';
export type { BodyOptions } from './body';
