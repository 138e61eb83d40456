/**
 * Token 计数能力：切片器只依赖这个接口，不关心具体词表
 * 实现必须是确定性的、无副作用的
 */
export interface ITokenCounter {
    countTokens(text: string): number;
}
