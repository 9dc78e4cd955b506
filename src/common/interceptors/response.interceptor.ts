import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { ApiResponse } from '../interfaces/response.interface';

const isApiResponse = (value: unknown): value is ApiResponse =>
  typeof value === 'object' && value !== null && 'data' in value && 'error' in value;

/**
 * 统一响应拦截器
 * 将所有成功响应包装为 { data: T, error: null } 格式
 */
@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ApiResponse<T> | ApiResponse> {
  intercept(
    _context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T> | ApiResponse> {
    return next.handle().pipe(
      map((data) => {
        // 如果返回值已经是 ApiResponse 格式，直接返回
        if (isApiResponse(data)) {
          return data;
        }
        return {
          data,
          error: null,
        };
      }),
    );
  }
}
