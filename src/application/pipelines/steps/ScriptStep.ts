import { PipelineStep, ProductContext } from '../PipelineInfrastructure';
import { IScriptGenerator } from '../../../domain/ports/IScriptGenerator';

export class ScriptStep implements PipelineStep {
    readonly name = 'Script';

    constructor(private readonly scriptGenerator: IScriptGenerator) { }

    async execute(context: ProductContext): Promise<ProductContext> {
        console.log(`[${context.productName}] Generating script...`);
        const script = await this.scriptGenerator.generateScript(context.product);
        return { ...context, script };
    }
}
