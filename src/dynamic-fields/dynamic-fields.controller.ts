import {
  ApiBody,
  ApiCreatedResponse,
  ApiHeader,
  ApiOkResponse,
  ApiQuery,
  ApiTags,
} from "@nestjs/swagger";
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpStatus,
  Inject,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  Res,
  UseFilters,
  UsePipes,
  ValidationPipe,
} from "@nestjs/common";
import { Response } from "express";
import { GetUserId } from "../common/decorators/getUserId.decorator";
import { AllExceptionsFilter } from "../common/filters/exception.filter";
import APIResponse from "../common/responses/response";
import { APIID } from "../common/utils/api-id.config";
import { API_RESPONSES } from "../common/utils/response.messages";
import {
  DynamicFieldsConfig,
  dynamicFieldsConfig,
} from "../config/dynamic-fields.config";
import { DynamicFieldDto } from "./dto/dynamic-field.dto";
import {
  ExportDynamicFieldsDto,
  ImportDynamicFieldsDto,
  ImportPreviewDto,
} from "./dto/dynamic-field-import-export.dto";
import { SetScreenLevelDto, SetScreenLevelsDto } from "./dto/dynamic-field-screen.dto";
import {
  SetDynamicFieldValueDto,
  toFieldValueData,
} from "./dto/dynamic-field-value.dto";
import { ValidationError } from "./errors/dynamic-field.errors";
import { DynamicFieldFilterService } from "./filters/dynamic-field-filter.service";
import { DynamicFieldImportExportService } from "./services/dynamic-field-import-export.service";
import { DynamicFieldScreenConfigService } from "./services/dynamic-field-screen-config.service";
import {
  DynamicFieldValuesService,
  FormValues,
} from "./services/dynamic-field-values.service";
import { DynamicFieldsService } from "./services/dynamic-fields.service";
import { SearchableFieldCache } from "./services/searchable-field-cache.service";
import { withDefaultLabel } from "./types/field-definition";
import {
  FieldType,
  ObjectType,
  isFieldType,
  isObjectType,
} from "./types/field-types";

function toObjectType(value: string): ObjectType {
  if (!isObjectType(value)) {
    throw new ValidationError("objectType", `invalid object type: ${value}`);
  }
  return value;
}

function optionalObjectType(value: string | undefined): ObjectType | undefined {
  return value ? toObjectType(value) : undefined;
}

function optionalFieldType(value: string | undefined): FieldType | undefined {
  if (!value) {
    return undefined;
  }
  if (!isFieldType(value)) {
    throw new ValidationError("fieldType", `invalid field type: ${value}`);
  }
  return value;
}

function optionalInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ValidationError(name, `${name} must be an integer`);
  }
  return parseInt(value, 10);
}

// Urlencoded bodies carry either one string or a list per key
function toFormValues(body: Record<string, unknown>): FormValues {
  const values: FormValues = {};
  for (const [key, raw] of Object.entries(body)) {
    if (typeof raw === "string") {
      values[key] = [raw];
    } else if (Array.isArray(raw)) {
      values[key] = raw.filter((item): item is string => typeof item === "string");
    }
  }
  return values;
}

@ApiTags("Dynamic Fields")
@ApiHeader({ name: "userid", required: false, description: "Acting user id" })
@Controller("dynamic-fields")
export class DynamicFieldsController {
  constructor(
    private readonly fieldsService: DynamicFieldsService,
    private readonly valuesService: DynamicFieldValuesService,
    private readonly screenConfigService: DynamicFieldScreenConfigService,
    private readonly searchableFieldCache: SearchableFieldCache,
    private readonly filterService: DynamicFieldFilterService,
    private readonly importExportService: DynamicFieldImportExportService,
    @Inject(dynamicFieldsConfig.KEY)
    private readonly config: DynamicFieldsConfig
  ) {}

  private actor(userId: number | undefined): number {
    return userId ?? this.config.systemUserId;
  }

  //list fields
  @Get()
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_LIST))
  @ApiOkResponse({ description: "Dynamic field list." })
  @ApiQuery({ name: "objectType", required: false, enum: ObjectType })
  @ApiQuery({ name: "fieldType", required: false, enum: FieldType })
  public async list(
    @Query("objectType") objectType: string | undefined,
    @Query("fieldType") fieldType: string | undefined,
    @Res() response: Response
  ) {
    const result = await this.fieldsService.list({
      objectType: optionalObjectType(objectType),
      fieldType: optionalFieldType(fieldType),
    });
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_LIST,
      result,
      HttpStatus.OK,
      API_RESPONSES.DYNAMIC_FIELD_LIST
    );
  }

  @Get("grouped")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_LIST_GROUPED))
  @ApiOkResponse({ description: "Dynamic fields grouped by object type." })
  public async listGrouped(@Res() response: Response) {
    const result = await this.fieldsService.listGroupedByObjectType();
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_LIST_GROUPED,
      result,
      HttpStatus.OK,
      API_RESPONSES.DYNAMIC_FIELD_LIST
    );
  }

  //values
  @Get("values/:objectId")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_VALUES_GET))
  public async getValues(
    @Param("objectId", ParseIntPipe) objectId: number,
    @Res() response: Response
  ) {
    const result = await this.valuesService.getValues(objectId);
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_VALUES_GET,
      result,
      HttpStatus.OK,
      API_RESPONSES.VALUES_FETCHED
    );
  }

  @Put("values")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_VALUE_SET))
  @UsePipes(new ValidationPipe())
  @ApiBody({ type: SetDynamicFieldValueDto })
  public async setValue(
    @Body() setValueDto: SetDynamicFieldValueDto,
    @Res() response: Response
  ) {
    await this.valuesService.setValue(
      setValueDto.fieldId,
      setValueDto.objectId,
      toFieldValueData(setValueDto)
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_VALUE_SET,
      { fieldId: setValueDto.fieldId, objectId: setValueDto.objectId },
      HttpStatus.OK,
      API_RESPONSES.VALUE_SAVED
    );
  }

  @Get("display/:objectType/:objectId")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_DISPLAY))
  @ApiQuery({ name: "screenKey", required: false })
  public async getDisplayValues(
    @Param("objectType") objectType: string,
    @Param("objectId", ParseIntPipe) objectId: number,
    @Query("screenKey") screenKey: string | undefined,
    @Res() response: Response
  ) {
    const result = await this.valuesService.getValuesForDisplay(
      objectId,
      toObjectType(objectType),
      screenKey || undefined
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_DISPLAY,
      result,
      HttpStatus.OK,
      API_RESPONSES.VALUES_FETCHED
    );
  }

  @Post("form/:objectType/:objectId/:screenKey")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_FORM))
  public async processForm(
    @Param("objectType") objectType: string,
    @Param("objectId", ParseIntPipe) objectId: number,
    @Param("screenKey") screenKey: string,
    @Body() body: Record<string, unknown>,
    @Res() response: Response
  ) {
    const written = await this.valuesService.processFormSubmission(
      toFormValues(body),
      objectId,
      toObjectType(objectType),
      screenKey
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_FORM,
      { written },
      HttpStatus.OK,
      API_RESPONSES.FORM_PROCESSED
    );
  }

  //screens
  @Get("screens")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_SCREEN_MATRIX))
  @ApiQuery({ name: "objectType", required: false, enum: ObjectType })
  public async getScreenMatrix(
    @Query("objectType") objectType: string | undefined,
    @Res() response: Response
  ) {
    const result = await this.screenConfigService.getMatrix(
      optionalObjectType(objectType) ?? ObjectType.TICKET
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_SCREEN_MATRIX,
      result,
      HttpStatus.OK,
      API_RESPONSES.SCREEN_MATRIX_FETCHED
    );
  }

  //search
  @Get("searchable")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_SEARCHABLE))
  public async getSearchable(@Res() response: Response) {
    const result = await this.searchableFieldCache.get();
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_SEARCHABLE,
      result,
      HttpStatus.OK,
      API_RESPONSES.SEARCHABLE_FIELDS_FETCHED
    );
  }

  @Get("filter")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_FILTER))
  @ApiQuery({ name: "startParam", required: false, type: Number })
  public async compileFilter(
    @Query() query: Record<string, unknown>,
    @Query("startParam") startParam: string | undefined,
    @Res() response: Response
  ) {
    const compiled = await this.filterService.compileFromQuery(
      query,
      optionalInt("startParam", startParam) ?? 1
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_FILTER,
      { sql: compiled.sql, params: compiled.params },
      HttpStatus.OK,
      API_RESPONSES.FILTER_COMPILED
    );
  }

  //import / export
  @Post("export")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_EXPORT))
  @UsePipes(new ValidationPipe())
  @ApiBody({ type: ExportDynamicFieldsDto })
  public async export(
    @Body() exportDto: ExportDynamicFieldsDto,
    @Res() response: Response
  ) {
    const screenNames = exportDto.screenNames ?? [];
    const names = [...new Set([...exportDto.fieldNames, ...screenNames])];
    const yaml = await this.importExportService.exportYaml(
      names,
      screenNames.length > 0,
      screenNames
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_EXPORT,
      { yaml },
      HttpStatus.OK,
      API_RESPONSES.EXPORT_SUCCESS
    );
  }

  @Post("import/preview")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_IMPORT_PREVIEW))
  @UsePipes(new ValidationPipe())
  @ApiBody({ type: ImportPreviewDto })
  public async previewImport(
    @Body() previewDto: ImportPreviewDto,
    @Res() response: Response
  ) {
    const document = this.importExportService.parseDocument(previewDto.yaml);
    const result = await this.importExportService.preview(document);
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_IMPORT_PREVIEW,
      result,
      HttpStatus.OK,
      API_RESPONSES.IMPORT_PREVIEW
    );
  }

  @Post("import")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_IMPORT))
  @UsePipes(new ValidationPipe())
  @ApiBody({ type: ImportDynamicFieldsDto })
  public async import(
    @Body() importDto: ImportDynamicFieldsDto,
    @GetUserId() userId: number | undefined,
    @Res() response: Response
  ) {
    const document = this.importExportService.parseDocument(importDto.yaml);
    const result = await this.importExportService.import(
      document,
      {
        fieldNames: importDto.fieldNames,
        screenNames: importDto.screenNames ?? [],
        overwrite: importDto.overwrite === true,
      },
      this.actor(userId)
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_IMPORT,
      result,
      HttpStatus.OK,
      API_RESPONSES.IMPORT_SUCCESS
    );
  }

  //single field
  @Get(":id")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_GET))
  public async getById(
    @Param("id", ParseIntPipe) id: number,
    @Res() response: Response
  ) {
    const result = await this.fieldsService.getById(id);
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_GET,
      result,
      HttpStatus.OK,
      API_RESPONSES.DYNAMIC_FIELD_GET
    );
  }

  @Post()
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_CREATE))
  @UsePipes(new ValidationPipe())
  @ApiCreatedResponse({ description: "Dynamic field has been created successfully." })
  @ApiBody({ type: DynamicFieldDto })
  public async create(
    @Body() fieldDto: DynamicFieldDto,
    @GetUserId() userId: number | undefined,
    @Res() response: Response
  ) {
    const result = await this.fieldsService.create(
      withDefaultLabel(fieldDto),
      this.actor(userId)
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_CREATE,
      result,
      HttpStatus.CREATED,
      API_RESPONSES.DYNAMIC_FIELD_CREATED
    );
  }

  @Put(":id")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_UPDATE))
  @UsePipes(new ValidationPipe())
  @ApiBody({ type: DynamicFieldDto })
  public async update(
    @Param("id", ParseIntPipe) id: number,
    @Body() fieldDto: DynamicFieldDto,
    @GetUserId() userId: number | undefined,
    @Res() response: Response
  ) {
    const result = await this.fieldsService.update(
      id,
      withDefaultLabel(fieldDto),
      this.actor(userId)
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_UPDATE,
      result,
      HttpStatus.OK,
      API_RESPONSES.DYNAMIC_FIELD_UPDATED
    );
  }

  @Delete(":id")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_DELETE))
  public async delete(
    @Param("id", ParseIntPipe) id: number,
    @Res() response: Response
  ) {
    await this.fieldsService.delete(id);
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_DELETE,
      { id },
      HttpStatus.OK,
      API_RESPONSES.DYNAMIC_FIELD_DELETED
    );
  }

  @Get(":id/distinct-values")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_DISTINCT_VALUES))
  @ApiQuery({ name: "limit", required: false, type: Number })
  public async getDistinctValues(
    @Param("id", ParseIntPipe) id: number,
    @Query("limit") limit: string | undefined,
    @Res() response: Response
  ) {
    const result = await this.valuesService.getDistinctValues(
      id,
      optionalInt("limit", limit)
    );
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_DISTINCT_VALUES,
      result,
      HttpStatus.OK,
      API_RESPONSES.DISTINCT_VALUES_FETCHED
    );
  }

  @Put(":id/screens")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_SCREEN_BULK_SET))
  @UsePipes(new ValidationPipe())
  @ApiBody({ type: SetScreenLevelsDto })
  public async setScreens(
    @Param("id", ParseIntPipe) id: number,
    @Body() levelsDto: SetScreenLevelsDto,
    @GetUserId() userId: number | undefined,
    @Res() response: Response
  ) {
    await this.screenConfigService.bulkSetForField(id, levelsDto.levels, this.actor(userId));
    const result = await this.screenConfigService.getConfigForField(id);
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_SCREEN_BULK_SET,
      result,
      HttpStatus.OK,
      API_RESPONSES.SCREEN_CONFIG_SAVED
    );
  }

  @Post(":id/screen")
  @UseFilters(new AllExceptionsFilter(APIID.DYNAMIC_FIELD_SCREEN_SET))
  @UsePipes(new ValidationPipe())
  @ApiBody({ type: SetScreenLevelDto })
  public async setScreen(
    @Param("id", ParseIntPipe) id: number,
    @Body() levelDto: SetScreenLevelDto,
    @GetUserId() userId: number | undefined,
    @Res() response: Response
  ) {
    await this.screenConfigService.setForField(
      id,
      levelDto.screenKey,
      levelDto.level,
      this.actor(userId)
    );
    const result = await this.screenConfigService.getConfigForField(id);
    return APIResponse.success(
      response,
      APIID.DYNAMIC_FIELD_SCREEN_SET,
      result,
      HttpStatus.OK,
      API_RESPONSES.SCREEN_CONFIG_SAVED
    );
  }
}
