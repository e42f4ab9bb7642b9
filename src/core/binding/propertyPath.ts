/**
 * 속성 경로 해석
 *
 * 'address.city' 같은 점 구분 경로를 읽고 씁니다.
 * 빈 경로와 '.'은 소스 자체를 가리킵니다.
 */

/**
 * 경로를 세그먼트로 분해
 */
export function splitPath(path: string | null | undefined): string[] {
  if (isBlankPath(path)) return [];
  return (path ?? '')
    .split('.')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

/**
 * 빈 경로 여부 (null, 공백, '.')
 */
export function isBlankPath(path: string | null | undefined): boolean {
  return path === null || path === undefined || path.trim() === '' || path.trim() === '.';
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * 경로 값 읽기
 *
 * 중간 값이 null/undefined거나 객체가 아니면 undefined를 반환합니다.
 */
export function resolvePath(source: unknown, path: string | null | undefined): unknown {
  let current: unknown = source;
  for (const segment of splitPath(path)) {
    if (!isObjectLike(current)) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * 경로 값 쓰기
 *
 * @returns 쓰기 성공 여부
 */
export function writePath(source: unknown, path: string | null | undefined, value: unknown): boolean {
  const segments = splitPath(path);
  const last = segments.pop();
  if (last === undefined) return false;

  const owner = resolvePath(source, segments.join('.'));
  if (!isObjectLike(owner)) return false;

  return Reflect.set(owner, last, value);
}
