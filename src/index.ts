/**
 * DataGrid Row - 그리드 행 렌더러
 *
 * 데이터 항목 하나와 컬럼 정의로 CSS grid 행을 만들고,
 * 표시 셀/편집 셀 생성, 선택 색상, 컬럼 변경 동기화를 담당합니다.
 * Vanilla TypeScript로 구현되어 React, Vue, Angular 등에서 래핑하여 사용할 수 있습니다.
 */

// 타입 내보내기
export * from './types';

// 코어 모듈 내보내기
export * from './core';

// UI 모듈 내보내기
export * from './ui';
