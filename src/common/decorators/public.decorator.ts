import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/**
 * 标记无需 X-Api-Key 的路由
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
