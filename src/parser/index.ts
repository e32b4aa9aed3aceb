export { parseLayoutModule } from './LayoutParser';
export { convertModuleToDefinitions, compileLayouts } from './toDefinition';
export type {
  LayoutModule,
  LayoutStruct,
  LayoutField,
  LayoutDataField,
  LayoutChecksumField,
  LayoutPaddingField,
  LayoutType,
  LayoutDimension,
} from './types';
