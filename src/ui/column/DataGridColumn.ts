/**
 * DataGridColumn - 컬럼 정의
 *
 * 바인딩 경로, 데이터 타입, 템플릿, 너비, 가시성, 정렬을 보유합니다.
 * 행(DataGridRow)은 이 정의를 읽어 셀을 만들고,
 * visibilityChanged / propertyChanged 이벤트로 동기화합니다.
 */

import { SimpleEventEmitter } from '../../core/SimpleEventEmitter';
import type {
  CellTemplate,
  ColumnWidth,
  DataType,
  LineBreakMode,
  PropertyChangedPayload,
  TextAlignment,
  Unsubscribe,
} from '../../types';
import type { PropertyChangeSource } from '../../core/ObservableObject';
import { HIDDEN_TRACK, toGridTrack } from '../utils/cssUtils';

/**
 * DataGridColumn 이벤트 타입
 */
interface DataGridColumnEvents {
  /** 가시성 변경 */
  visibilityChanged: { column: DataGridColumn; isVisible: boolean };
  /** 속성 변경 */
  propertyChanged: PropertyChangedPayload;
}

/**
 * DataGridColumn 설정
 */
export interface DataGridColumnOptions {
  /** 헤더 제목 */
  title?: string;
  /** 바인딩 속성 경로 (예: 'name', 'address.city') */
  propertyName?: string | null;
  /** 데이터 타입 @default 'string' */
  dataType?: DataType;
  /** 너비 @default '*' */
  width?: ColumnWidth;
  /** 표시 여부 @default true */
  isVisible?: boolean;
  /** 표시 셀 템플릿 */
  cellTemplate?: CellTemplate | null;
  /** 편집 셀 템플릿 */
  editCellTemplate?: CellTemplate | null;
  /** 표시 서식 (예: '{0:N2}') */
  stringFormat?: string | null;
  /** 가로 정렬 @default 'start' */
  horizontalTextAlignment?: TextAlignment;
  /** 세로 정렬 @default 'center' */
  verticalTextAlignment?: TextAlignment;
  /** 줄바꿈 모드 @default 'word-wrap' */
  lineBreakMode?: LineBreakMode;
}

/**
 * 컬럼 정의
 */
export class DataGridColumn extends SimpleEventEmitter<DataGridColumnEvents> implements PropertyChangeSource {
  private _title: string;
  private _propertyName: string | null;
  private _dataType: DataType;
  private _width: ColumnWidth;
  private _isVisible: boolean;
  private _cellTemplate: CellTemplate | null;
  private _editCellTemplate: CellTemplate | null;
  private _stringFormat: string | null;
  private _horizontalTextAlignment: TextAlignment;
  private _verticalTextAlignment: TextAlignment;
  private _lineBreakMode: LineBreakMode;

  // 너비에서 계산한 트랙 (보이는 상태 기준)
  private track: string;

  constructor(options: DataGridColumnOptions = {}) {
    super();
    this._title = options.title ?? '';
    this._propertyName = options.propertyName ?? null;
    this._dataType = options.dataType ?? 'string';
    this._width = options.width ?? '*';
    this._isVisible = options.isVisible ?? true;
    this._cellTemplate = options.cellTemplate ?? null;
    this._editCellTemplate = options.editCellTemplate ?? null;
    this._stringFormat = options.stringFormat ?? null;
    this._horizontalTextAlignment = options.horizontalTextAlignment ?? 'start';
    this._verticalTextAlignment = options.verticalTextAlignment ?? 'center';
    this._lineBreakMode = options.lineBreakMode ?? 'word-wrap';
    this.track = toGridTrack(this._width);
  }

  // ===========================================================================
  // 레이아웃
  // ===========================================================================

  /**
   * CSS grid 트랙 (숨김이면 '0px')
   */
  get columnDefinition(): string {
    return this._isVisible ? this.track : HIDDEN_TRACK;
  }

  get width(): ColumnWidth {
    return this._width;
  }

  set width(value: ColumnWidth) {
    const old = this._width;
    if (old === value) return;
    this.track = toGridTrack(value);
    this._width = value;
    this.notify('width', old, value);
  }

  get isVisible(): boolean {
    return this._isVisible;
  }

  set isVisible(value: boolean) {
    if (this._isVisible === value) return;
    this._isVisible = value;
    this.emit('visibilityChanged', { column: this, isVisible: value });
    this.notify('isVisible', !value, value);
  }

  // ===========================================================================
  // 바인딩 / 표시
  // ===========================================================================

  get title(): string {
    return this._title;
  }

  set title(value: string) {
    const old = this._title;
    this._title = value;
    this.notify('title', old, value);
  }

  get propertyName(): string | null {
    return this._propertyName;
  }

  set propertyName(value: string | null) {
    const old = this._propertyName;
    this._propertyName = value;
    this.notify('propertyName', old, value);
  }

  get dataType(): DataType {
    return this._dataType;
  }

  set dataType(value: DataType) {
    const old = this._dataType;
    this._dataType = value;
    this.notify('dataType', old, value);
  }

  get cellTemplate(): CellTemplate | null {
    return this._cellTemplate;
  }

  set cellTemplate(value: CellTemplate | null) {
    const old = this._cellTemplate;
    this._cellTemplate = value;
    this.notify('cellTemplate', old, value);
  }

  get editCellTemplate(): CellTemplate | null {
    return this._editCellTemplate;
  }

  set editCellTemplate(value: CellTemplate | null) {
    const old = this._editCellTemplate;
    this._editCellTemplate = value;
    this.notify('editCellTemplate', old, value);
  }

  get stringFormat(): string | null {
    return this._stringFormat;
  }

  set stringFormat(value: string | null) {
    const old = this._stringFormat;
    this._stringFormat = value;
    this.notify('stringFormat', old, value);
  }

  get horizontalTextAlignment(): TextAlignment {
    return this._horizontalTextAlignment;
  }

  set horizontalTextAlignment(value: TextAlignment) {
    const old = this._horizontalTextAlignment;
    this._horizontalTextAlignment = value;
    this.notify('horizontalTextAlignment', old, value);
  }

  get verticalTextAlignment(): TextAlignment {
    return this._verticalTextAlignment;
  }

  set verticalTextAlignment(value: TextAlignment) {
    const old = this._verticalTextAlignment;
    this._verticalTextAlignment = value;
    this.notify('verticalTextAlignment', old, value);
  }

  get lineBreakMode(): LineBreakMode {
    return this._lineBreakMode;
  }

  set lineBreakMode(value: LineBreakMode) {
    const old = this._lineBreakMode;
    this._lineBreakMode = value;
    this.notify('lineBreakMode', old, value);
  }

  // ===========================================================================
  // 이벤트
  // ===========================================================================

  /**
   * 속성 변경 구독
   */
  onPropertyChanged(handler: (payload: PropertyChangedPayload) => void): Unsubscribe {
    return this.on('propertyChanged', handler);
  }

  /**
   * 가시성 변경 구독
   */
  onVisibilityChanged(handler: (payload: DataGridColumnEvents['visibilityChanged']) => void): Unsubscribe {
    return this.on('visibilityChanged', handler);
  }

  private notify(propertyName: string, oldValue: unknown, newValue: unknown): void {
    if (oldValue === newValue) return;
    this.emit('propertyChanged', { propertyName, oldValue, newValue });
  }
}
