/**
 * Gatehouse - Exception Module
 */

export {
  HttpException,
  BadRequestException,
  UnauthorizedException,
  ForbiddenException,
  NotFoundException,
  MethodNotAllowedException,
  UnsupportedMediaTypeException,
  InternalServerException,
  toHttpError,
  describeError,
} from './exceptions';
