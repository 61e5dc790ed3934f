import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';

export type SimulationFunctionName = 'runSimulation' | 'compareSimulations' | 'getDefaultParameters';

export interface PotatoTwinStackProps extends cdk.StackProps {
  stage?: string;
  // Compiled handlers (tsc output)
  lambdaAssetPath?: string;
  // Directory holding nodejs/node_modules with the runtime dependencies
  dependenciesLayerPath?: string;
  maxSimulationDays?: number;
  maxScenariosPerRequest?: number;
}

const HANDLER_MODULE = 'src/digital-twin-engine/simulation-handler';

export class PotatoTwinStack extends cdk.Stack {
  public readonly logGroup: logs.LogGroup;

  // Lambda Layer for runtime dependencies
  public readonly dependenciesLayer: lambda.LayerVersion;

  public readonly simulationFunctions: Record<SimulationFunctionName, lambda.Function>;

  public readonly api: apigateway.RestApi;

  constructor(scope: Construct, id: string, props: PotatoTwinStackProps = {}) {
    super(scope, id, props);

    this.logGroup = new logs.LogGroup(this, 'SimulationLogGroup', {
      logGroupName: '/aws/lambda/potato-twin',
      retention: logs.RetentionDays.ONE_MONTH,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    this.dependenciesLayer = new lambda.LayerVersion(this, 'DependenciesLayer', {
      layerVersionName: 'PotatoTwin-Dependencies',
      code: lambda.Code.fromAsset(props.dependenciesLayerPath ?? 'layer'),
      compatibleRuntimes: [lambda.Runtime.NODEJS_20_X],
      description: 'Runtime dependencies for the potato twin Lambda functions',
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    this.simulationFunctions = this.createSimulationFunctions(props);
    this.api = this.createApi();

    this.createOutputs();
  }

  private createSimulationFunctions(props: PotatoTwinStackProps): Record<SimulationFunctionName, lambda.Function> {
    const code = lambda.Code.fromAsset(props.lambdaAssetPath ?? 'dist');
    const environment = {
      STAGE: props.stage ?? 'development',
      LOG_LEVEL: 'INFO',
      MAX_SIMULATION_DAYS: String(props.maxSimulationDays ?? 365),
      MAX_SCENARIOS_PER_REQUEST: String(props.maxScenariosPerRequest ?? 10),
    };

    const createFunction = (id: string, handlerName: SimulationFunctionName, memorySize: number): lambda.Function =>
      new lambda.Function(this, id, {
        functionName: `PotatoTwin-${id}`,
        runtime: lambda.Runtime.NODEJS_20_X,
        code,
        handler: `${HANDLER_MODULE}.${handlerName}`,
        layers: [this.dependenciesLayer],
        memorySize,
        timeout: cdk.Duration.seconds(30),
        logGroup: this.logGroup,
        environment,
      });

    return {
      runSimulation: createFunction('RunSimulation', 'runSimulation', 256),
      // Comparisons run several simulations per request
      compareSimulations: createFunction('CompareSimulations', 'compareSimulations', 512),
      getDefaultParameters: createFunction('GetDefaultParameters', 'getDefaultParameters', 128),
    };
  }

  private createApi(): apigateway.RestApi {
    const api = new apigateway.RestApi(this, 'SimulationApi', {
      restApiName: 'PotatoTwin-Simulation',
      description: 'Run and compare potato chamber simulations',
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: ['GET', 'POST', 'OPTIONS'],
      },
    });

    const simulations = api.root.addResource('simulations');
    simulations.addMethod('POST', new apigateway.LambdaIntegration(this.simulationFunctions.runSimulation));
    simulations
      .addResource('compare')
      .addMethod('POST', new apigateway.LambdaIntegration(this.simulationFunctions.compareSimulations));
    api.root
      .addResource('defaults')
      .addMethod('GET', new apigateway.LambdaIntegration(this.simulationFunctions.getDefaultParameters));

    return api;
  }

  private createOutputs(): void {
    new cdk.CfnOutput(this, 'SimulationApiUrl', {
      value: this.api.url,
      description: 'Base URL of the simulation API',
      exportName: 'PotatoTwin-SimulationApiUrl',
    });

    new cdk.CfnOutput(this, 'DependenciesLayerArn', {
      value: this.dependenciesLayer.layerVersionArn,
      description: 'ARN of the runtime dependencies Lambda layer',
      exportName: 'PotatoTwin-DependenciesLayerArn',
    });
  }
}
